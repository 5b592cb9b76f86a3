import { z } from 'zod';
import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { windowMinutesParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { DegradationReport } from '../../analytics/index.js';
import type { DegradationConfig } from '../../config/types.js';

const buildSchema = (degradation: DegradationConfig) => ({
  time_window_minutes: windowMinutesParam(degradation.windowMinutes),
  threshold_percent: z.number().positive().max(10000).optional()
    .describe(`Minimum worsening change in percent to flag a service (default: ${degradation.thresholdPercent})`)
});

type GetDegradingServicesSchema = ReturnType<typeof buildSchema>;
type GetDegradingServicesArgs = MCPToolSchema<GetDegradingServicesSchema>;

export interface DegradingServicesResult extends DegradationReport {
  count: number;
}

/**
 * Compares the last window with the one before it for every service
 */
export class GetDegradingServicesTool extends BaseTool<GetDegradingServicesSchema, DegradingServicesResult> {
  private readonly schema: GetDegradingServicesSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_degrading_services',
      category: ToolCategory.DEGRADATION,
      description: 'Identify services whose error rate or response time (mean, p95, p99) rose by more than the threshold in the last window compared with the window before it'
    });
    this.schema = buildSchema(context.config.degradation);
  }

  protected getSchema() {
    return this.schema;
  }

  protected executeImpl(args: GetDegradingServicesArgs, snapshot: MetricSnapshot): DegradingServicesResult {
    const report = this.context.detector.detect(snapshot, args.time_window_minutes, args.threshold_percent);
    return { ...report, count: report.degrading.length };
  }
}
