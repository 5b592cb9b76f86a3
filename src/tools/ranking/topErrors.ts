import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { limitParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { RankingConfig } from '../../config/types.js';
import type { ErrorCodeBucket } from '../../analytics/index.js';

const buildSchema = (ranking: RankingConfig) => ({
  limit: limitParam(ranking)
});

type TopErrorsSchema = ReturnType<typeof buildSchema>;
type TopErrorsArgs = MCPToolSchema<TopErrorsSchema>;

export interface TopErrorsResult {
  limit: number;
  count: number;
  total_errors: number;
  errors: ErrorCodeBucket[];
}

/**
 * Error-code histogram over every error record with a positive error count
 */
export class TopErrorsTool extends BaseTool<TopErrorsSchema, TopErrorsResult> {
  private readonly schema: TopErrorsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_top_errors',
      category: ToolCategory.RANKING,
      description: 'Get the most frequent error codes across all error records, by total error count'
    });
    this.schema = buildSchema(context.config.ranking);
  }

  protected getSchema() {
    return this.schema;
  }

  protected executeImpl(args: TopErrorsArgs, snapshot: MetricSnapshot): TopErrorsResult {
    const { total_errors, errors } = this.context.ranker.topErrors(snapshot, args.limit);
    return { limit: args.limit, count: errors.length, total_errors, errors };
  }
}
