import { BaseTool, ToolCategory, AnalyticsContext, ServiceNotFound } from '../base/tool.js';
import { serviceNameParam, windowHoursParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { ServiceEvaluation } from '../../analytics/index.js';

const GetCurrentSliArgsSchema = {
  service_name: serviceNameParam.optional().describe('Limit the result to one service'),
  time_window_hours: windowHoursParam.optional()
    .describe('Evaluate the last N hours before the latest record; the whole snapshot when omitted')
};

type GetCurrentSliArgs = MCPToolSchema<typeof GetCurrentSliArgsSchema>;

export interface CurrentSliResult {
  time_window_hours: number | null;
  count: number;
  services: ServiceEvaluation[];
}

/**
 * SLI, SLO compliance and error-budget state per service
 */
export class GetCurrentSliTool extends BaseTool<typeof GetCurrentSliArgsSchema, CurrentSliResult | ServiceNotFound> {
  static readonly schema = GetCurrentSliArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_current_sli',
      category: ToolCategory.SLO,
      description: 'Get the current SLI for each service (or one): compliance against its SLO target, error-budget consumption and burn rate. Services without traffic in the window are reported as insufficient_data.'
    });
  }

  protected getSchema() {
    return GetCurrentSliArgsSchema;
  }

  protected executeImpl(args: GetCurrentSliArgs, snapshot: MetricSnapshot): CurrentSliResult | ServiceNotFound {
    if (args.service_name !== undefined && !snapshot.hasService(args.service_name)) {
      return this.notFound(args.service_name);
    }
    const services = this.context.evaluator.evaluate(snapshot, {
      service: args.service_name,
      windowHours: args.time_window_hours ?? null
    });
    return {
      time_window_hours: args.time_window_hours ?? null,
      count: services.length,
      services
    };
  }
}
