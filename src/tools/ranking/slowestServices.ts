import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { limitParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { RankingConfig } from '../../config/types.js';
import type { ServiceAggregate } from '../../analytics/index.js';

const buildSchema = (ranking: RankingConfig) => ({
  limit: limitParam(ranking)
});

type SlowestServicesSchema = ReturnType<typeof buildSchema>;
type SlowestServicesArgs = MCPToolSchema<SlowestServicesSchema>;

export interface SlowestServicesResult {
  limit: number;
  count: number;
  services: ServiceAggregate[];
}

/**
 * Ties break by service name ascending
 */
export class SlowestServicesTool extends BaseTool<SlowestServicesSchema, SlowestServicesResult> {
  private readonly schema: SlowestServicesSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_slowest_services',
      category: ToolCategory.RANKING,
      description: 'Get the slowest services ranked by mean response time; services without response-time data are left out'
    });
    this.schema = buildSchema(context.config.ranking);
  }

  protected getSchema() {
    return this.schema;
  }

  protected executeImpl(args: SlowestServicesArgs, snapshot: MetricSnapshot): SlowestServicesResult {
    const services = this.context.ranker.slowest(snapshot, args.limit);
    return { limit: args.limit, count: services.length, services };
  }
}
