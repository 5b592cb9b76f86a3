import { BaseTool, ToolCategory, AnalyticsContext, ServiceNotFound } from '../base/tool.js';
import { serviceNameParam, windowHoursParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type { ErrorBudgetReport, InsufficientData } from '../../analytics/index.js';

const buildSchema = (defaultHours: number) => ({
  service_name: serviceNameParam,
  time_window_hours: windowHoursParam.default(defaultHours)
    .describe(`Budget window in hours before the latest record (default: ${defaultHours})`)
});

type CalculateErrorBudgetSchema = ReturnType<typeof buildSchema>;
type CalculateErrorBudgetArgs = MCPToolSchema<CalculateErrorBudgetSchema>;

/**
 * Error budget for one service. Consumed percent is
 * `(target - sli) / (100 - target) * 100`; a negative value is surplus.
 */
export class CalculateErrorBudgetTool extends BaseTool<
  CalculateErrorBudgetSchema,
  ErrorBudgetReport | InsufficientData | ServiceNotFound
> {
  private readonly schema: CalculateErrorBudgetSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'calculate_error_budget',
      category: ToolCategory.SLO,
      description: 'Calculate error-budget consumption and burn rate for a service over a time window. Negative consumption means budget surplus; at 100% or more the budget is exhausted.'
    });
    this.schema = buildSchema(context.config.slo.defaultBudgetWindowHours);
  }

  protected getSchema() {
    return this.schema;
  }

  protected executeImpl(
    args: CalculateErrorBudgetArgs,
    snapshot: MetricSnapshot
  ): ErrorBudgetReport | InsufficientData | ServiceNotFound {
    if (!snapshot.hasService(args.service_name)) {
      return this.notFound(args.service_name);
    }
    return this.context.evaluator.errorBudget(snapshot, args.service_name, args.time_window_hours);
  }
}
