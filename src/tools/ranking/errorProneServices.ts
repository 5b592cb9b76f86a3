import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { limitParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { RankingConfig } from '../../config/types.js';
import type { ServiceAggregate } from '../../analytics/index.js';

const buildSchema = (ranking: RankingConfig) => ({
  limit: limitParam(ranking)
});

type ErrorProneServicesSchema = ReturnType<typeof buildSchema>;
type ErrorProneServicesArgs = MCPToolSchema<ErrorProneServicesSchema>;

export interface ErrorProneServicesResult {
  limit: number;
  count: number;
  services: ServiceAggregate[];
}

export class ErrorProneServicesTool extends BaseTool<ErrorProneServicesSchema, ErrorProneServicesResult> {
  private readonly schema: ErrorProneServicesSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_error_prone_services',
      category: ToolCategory.RANKING,
      description: 'Get the services with the highest mean error rate; services with no errors are left out'
    });
    this.schema = buildSchema(context.config.ranking);
  }

  protected getSchema() {
    return this.schema;
  }

  protected executeImpl(args: ErrorProneServicesArgs, snapshot: MetricSnapshot): ErrorProneServicesResult {
    const services = this.context.ranker.errorProne(snapshot, args.limit);
    return { limit: args.limit, count: services.length, services };
  }
}
