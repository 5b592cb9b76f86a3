import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { windowHoursParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { PredictionReport } from '../../analytics/index.js';

const PredictIssuesTodayArgsSchema = {
  horizon_hours: windowHoursParam.optional()
    .describe('How far ahead to extrapolate, in hours; defaults to and is capped at the configured horizon')
};

type PredictIssuesTodayArgs = MCPToolSchema<typeof PredictIssuesTodayArgsSchema>;

export interface PredictionResult extends PredictionReport {
  count: number;
}

/**
 * Linear trend per service over hourly buckets, extrapolated to find upcoming breaches
 */
export class PredictIssuesTodayTool extends BaseTool<typeof PredictIssuesTodayArgsSchema, PredictionResult> {
  static readonly schema = PredictIssuesTodayArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'predict_issues_today',
      category: ToolCategory.TRENDS,
      description: 'Predict which services are likely to breach their error-rate or response-time targets soon, from the trend of recent hourly buckets. Improving or flat trends are never flagged.'
    });
  }

  protected getSchema() {
    return PredictIssuesTodayArgsSchema;
  }

  protected executeImpl(args: PredictIssuesTodayArgs, snapshot: MetricSnapshot): PredictionResult {
    const { bucketMinutes } = this.context.config.trend;
    const horizonBuckets = args.horizon_hours !== undefined
      ? Math.max(1, Math.ceil((args.horizon_hours * 60) / bucketMinutes))
      : undefined;

    const report = this.context.predictor.predict(snapshot, horizonBuckets);
    return { ...report, count: report.at_risk.length };
  }
}
