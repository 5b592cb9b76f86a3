import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { HealthOverview } from '../../analytics/index.js';

const ServiceHealthOverviewArgsSchema = {};

type ServiceHealthOverviewArgs = MCPToolSchema<typeof ServiceHealthOverviewArgsSchema>;

export class ServiceHealthOverviewTool extends BaseTool<typeof ServiceHealthOverviewArgsSchema, HealthOverview> {
  static readonly schema = ServiceHealthOverviewArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_service_health_overview',
      category: ToolCategory.RANKING,
      description: 'Get system-wide health counts: healthy, degraded and SLO-violating services, plus overall traffic and error rate'
    });
  }

  protected getSchema() {
    return ServiceHealthOverviewArgsSchema;
  }

  protected executeImpl(_args: ServiceHealthOverviewArgs, snapshot: MetricSnapshot): HealthOverview {
    const { evaluator, detector, ranker } = this.context;
    return ranker.overview(snapshot, evaluator.evaluate(snapshot), detector.detect(snapshot));
  }
}
