import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { limitParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { RankingConfig } from '../../config/types.js';
import type { ServiceAggregate } from '../../analytics/index.js';

const buildSchema = (ranking: RankingConfig) => ({
  limit: limitParam(ranking)
});

type TopServicesByVolumeSchema = ReturnType<typeof buildSchema>;
type TopServicesByVolumeArgs = MCPToolSchema<TopServicesByVolumeSchema>;

export interface TopServicesByVolumeResult {
  limit: number;
  count: number;
  services: ServiceAggregate[];
}

export class TopServicesByVolumeTool extends BaseTool<TopServicesByVolumeSchema, TopServicesByVolumeResult> {
  private readonly schema: TopServicesByVolumeSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_top_services_by_volume',
      category: ToolCategory.RANKING,
      description: 'Get the busiest services ranked by total request volume over the whole snapshot'
    });
    this.schema = buildSchema(context.config.ranking);
  }

  protected getSchema() {
    return this.schema;
  }

  protected executeImpl(args: TopServicesByVolumeArgs, snapshot: MetricSnapshot): TopServicesByVolumeResult {
    const services = this.context.ranker.topByVolume(snapshot, args.limit);
    return { limit: args.limit, count: services.length, services };
  }
}
