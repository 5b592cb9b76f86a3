import { BaseTool, ToolCategory, AnalyticsContext, ServiceNotFound } from '../base/tool.js';
import { serviceNameParam } from '../base/params.js';
import { MCPToolSchema } from '../../types.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type {
  ErrorBudgetReport,
  InsufficientData,
  ServiceComparison,
  ServiceEvaluation,
  ServiceTargets
} from '../../analytics/index.js';
import { resolveTargets } from '../../analytics/index.js';

const GetServiceSummaryArgsSchema = {
  service_name: serviceNameParam
};

type GetServiceSummaryArgs = MCPToolSchema<typeof GetServiceSummaryArgsSchema>;

export interface ServiceSummary {
  status: 'ok';
  service: string;
  last_update: Date | null;
  data_points: number;
  targets: ServiceTargets;
  latest: {
    record_time: Date;
    total_requests: number;
    error_rate: number | null;
    response_time_avg: number | null;
    response_time_p95: number | null;
    response_time_p99: number | null;
  } | null;
  /** Whole-snapshot evaluation */
  sli: ServiceEvaluation;
  error_budget: ErrorBudgetReport | InsufficientData;
  degradation: {
    status: 'degrading' | 'stable' | 'no_baseline' | 'no_recent';
    window_minutes: number;
    details: ServiceComparison | null;
  };
}

/**
 * One-stop view of a service: SLI, budget, targets, latest figures and degradation state
 */
export class GetServiceSummaryTool extends BaseTool<typeof GetServiceSummaryArgsSchema, ServiceSummary | ServiceNotFound> {
  static readonly schema = GetServiceSummaryArgsSchema;

  constructor(context: AnalyticsContext) {
    super(context, {
      name: 'get_service_summary',
      category: ToolCategory.SLO,
      description: 'Get a comprehensive summary for one service: SLI and compliance, error budget, targets, latest metrics and whether it is degrading'
    });
  }

  protected getSchema() {
    return GetServiceSummaryArgsSchema;
  }

  protected executeImpl(args: GetServiceSummaryArgs, snapshot: MetricSnapshot): ServiceSummary | ServiceNotFound {
    const service = args.service_name;
    if (!snapshot.hasService(service)) {
      return this.notFound(service);
    }

    const { evaluator, detector, config } = this.context;
    const rows = snapshot.queryWindow('service', { service });
    const last = rows.length > 0 ? rows[rows.length - 1] : null;

    const [sli] = evaluator.evaluate(snapshot, { service });
    const degradation = detector.detect(snapshot);
    const comparison = degradation.degrading.find(entry => entry.service === service) ?? null;

    let degradationStatus: ServiceSummary['degradation']['status'] = 'stable';
    if (comparison) {
      degradationStatus = 'degrading';
    } else if (degradation.no_baseline.includes(service)) {
      degradationStatus = 'no_baseline';
    } else if (degradation.no_recent.includes(service)) {
      degradationStatus = 'no_recent';
    }

    return {
      status: 'ok',
      service,
      last_update: last ? last.recordTime : null,
      data_points: rows.length,
      targets: resolveTargets(rows, config.slo),
      latest: last && {
        record_time: last.recordTime,
        total_requests: last.totalCount,
        error_rate: last.errorRate,
        response_time_avg: last.responseTimeAvg,
        response_time_p95: last.responseTimeP95,
        response_time_p99: last.responseTimeP99
      },
      sli,
      error_budget: evaluator.errorBudget(snapshot, service, config.slo.defaultBudgetWindowHours),
      degradation: {
        status: degradationStatus,
        window_minutes: degradation.window_minutes,
        details: comparison
      }
    };
  }
}
