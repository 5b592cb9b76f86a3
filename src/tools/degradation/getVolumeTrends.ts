import { BaseTool, ToolCategory, AnalyticsContext, ServiceNotFound } from '../base/tool.js';
import { serviceNameParam, windowMinutesParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { VolumeTrends } from '../../analytics/index.js';

const GetVolumeTrendsArgsSchema = {
  service_name: serviceNameParam,
  time_window_minutes: windowMinutesParam(30)
};

type GetVolumeTrendsArgs = MCPToolSchema<typeof GetVolumeTrendsArgsSchema>;

export class GetVolumeTrendsTool extends BaseTool<typeof GetVolumeTrendsArgsSchema, VolumeTrends | ServiceNotFound> {
  static readonly schema = GetVolumeTrendsArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_volume_trends',
      category: ToolCategory.DEGRADATION,
      description: 'Get request volume over the last window for a service as a time series, with a summary and the change against the previous window'
    });
  }

  protected getSchema() {
    return GetVolumeTrendsArgsSchema;
  }

  protected executeImpl(args: GetVolumeTrendsArgs, snapshot: MetricSnapshot): VolumeTrends | ServiceNotFound {
    if (!snapshot.hasService(args.service_name)) {
      return this.notFound(args.service_name);
    }
    return this.context.detector.volumeTrends(snapshot, args.service_name, args.time_window_minutes);
  }
}
