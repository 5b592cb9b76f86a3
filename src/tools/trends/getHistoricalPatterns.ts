import { BaseTool, ToolCategory, AnalyticsContext, ServiceNotFound } from '../base/tool.js';
import { serviceNameParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { HistoricalPatterns } from '../../analytics/index.js';

const GetHistoricalPatternsArgsSchema = {
  service_name: serviceNameParam
};

type GetHistoricalPatternsArgs = MCPToolSchema<typeof GetHistoricalPatternsArgsSchema>;

export class GetHistoricalPatternsTool extends BaseTool<
  typeof GetHistoricalPatternsArgsSchema,
  HistoricalPatterns | ServiceNotFound
> {
  static readonly schema = GetHistoricalPatternsArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_historical_patterns',
      category: ToolCategory.TRENDS,
      description: 'Get historical statistics for a service: error-rate and response-time percentiles, traffic, hour-of-day profile (UTC), fitted slopes and anomalous data points'
    });
  }

  protected getSchema() {
    return GetHistoricalPatternsArgsSchema;
  }

  protected executeImpl(args: GetHistoricalPatternsArgs, snapshot: MetricSnapshot): HistoricalPatterns | ServiceNotFound {
    return this.context.predictor.historicalPatterns(snapshot, args.service_name) ?? this.notFound(args.service_name);
  }
}
