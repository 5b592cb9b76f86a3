import { BaseTool, ToolCategory, AnalyticsContext } from '../base/tool.js';
import { windowHoursParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { SloViolation } from '../../analytics/index.js';

const GetSloViolationsArgsSchema = {
  time_window_hours: windowHoursParam.optional()
    .describe('Evaluate the last N hours before the latest record; the whole snapshot when omitted')
};

type GetSloViolationsArgs = MCPToolSchema<typeof GetSloViolationsArgsSchema>;

export interface SloViolationsResult {
  time_window_hours: number | null;
  count: number;
  violations: SloViolation[];
}

export class GetSloViolationsTool extends BaseTool<typeof GetSloViolationsArgsSchema, SloViolationsResult> {
  static readonly schema = GetSloViolationsArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_slo_violations',
      category: ToolCategory.SLO,
      description: 'List services whose SLI is below their SLO target, worst error-budget consumption first, with the checks each one fails'
    });
  }

  protected getSchema() {
    return GetSloViolationsArgsSchema;
  }

  protected executeImpl(args: GetSloViolationsArgs, snapshot: MetricSnapshot): SloViolationsResult {
    const violations = this.context.evaluator.violations(snapshot, args.time_window_hours ?? null);
    return {
      time_window_hours: args.time_window_hours ?? null,
      count: violations.length,
      violations
    };
  }
}
