import { BaseTool, ToolCategory, AnalyticsContext, ServiceNotFound } from '../base/tool.js';
import { serviceNameParam, windowMinutesParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { ErrorCodeDistribution } from '../../analytics/index.js';

const GetErrorCodeDistributionArgsSchema = {
  service_name: serviceNameParam.optional().describe('Limit the distribution to one service'),
  time_window_minutes: windowMinutesParam(30)
};

type GetErrorCodeDistributionArgs = MCPToolSchema<typeof GetErrorCodeDistributionArgsSchema>;

export class GetErrorCodeDistributionTool extends BaseTool<
  typeof GetErrorCodeDistributionArgsSchema,
  ErrorCodeDistribution | ServiceNotFound
> {
  static readonly schema = GetErrorCodeDistributionArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_error_code_distribution',
      category: ToolCategory.DEGRADATION,
      description: 'Get the distribution of error codes over the last window of error records, for all services or one'
    });
  }

  protected getSchema() {
    return GetErrorCodeDistributionArgsSchema;
  }

  protected executeImpl(
    args: GetErrorCodeDistributionArgs,
    snapshot: MetricSnapshot
  ): ErrorCodeDistribution | ServiceNotFound {
    if (args.service_name !== undefined && !snapshot.hasService(args.service_name)) {
      return this.notFound(args.service_name);
    }
    return this.context.detector.errorCodeDistribution(snapshot, args.time_window_minutes, args.service_name);
  }
}
