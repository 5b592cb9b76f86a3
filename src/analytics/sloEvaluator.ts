import type { SloConfig } from '../config/types.js';
import type { ServiceMetricRecord } from '../types/telemetry.js';
import type { MetricSnapshot } from '../store/snapshot.js';
import { compareNames, mean, round, sum } from './statistics.js';
import { resolveTargets, ServiceTargets } from './targets.js';

const HOUR_MS = 60 * 60 * 1000;

export type BudgetStatus = 'surplus' | 'consuming' | 'exhausted';
export type BurnSeverity = 'healthy' | 'warning' | 'critical' | 'emergency';

export interface EvaluationWindow {
  start: Date | null;
  end: Date | null;
  /** Length the burn rate is measured over; null when it is zero */
  hours: number | null;
}

export interface SliEvaluation {
  status: 'ok';
  service: string;
  window: EvaluationWindow;
  sli_percent: number;
  slo_target: number;
  is_violating: boolean;
  /** Share of the allowed failure budget used; negative is surplus */
  error_budget_consumed_percent: number;
  error_budget_remaining_percent: number;
  budget_status: BudgetStatus;
  /** Consumed budget percent per hour of the window */
  burn_rate: number | null;
  /** Observed failure share over the allowed failure share */
  burn_rate_multiple: number;
  burn_severity: BurnSeverity;
  total_requests: number;
  error_count: number;
  violating_requests: number;
  error_rate_percent: number;
  error_rate_target: number;
  error_slo_met: boolean;
  avg_response_time: number | null;
  response_time_target: number;
  response_slo_met: boolean | null;
  data_points: number;
}

export interface InsufficientData {
  status: 'insufficient_data';
  service: string;
  window: EvaluationWindow;
  total_requests: 0;
  data_points: number;
}

export type ServiceEvaluation = SliEvaluation | InsufficientData;

export interface SloViolation extends SliEvaluation {
  violations: string[];
}

export interface ErrorBudgetReport {
  status: 'ok';
  service: string;
  time_window_hours: number;
  window: EvaluationWindow;
  slo_target: number;
  sli_percent: number;
  total_requests: number;
  violating_requests: number;
  /** Violating requests the target tolerates over this traffic */
  allowed_violating_requests: number;
  error_budget_consumed_percent: number;
  error_budget_remaining_percent: number;
  budget_status: BudgetStatus;
  is_violating: boolean;
  burn_rate: number | null;
  burn_rate_multiple: number;
  burn_severity: BurnSeverity;
}

/**
 * Violating requests in one row: every request when the row's mean latency is
 * over target, otherwise its errors. Unknown latency is judged on errors only.
 */
function violatingRequests(row: ServiceMetricRecord, targets: ServiceTargets): number {
  if (row.responseTimeAvg !== null && row.responseTimeAvg > targets.responseTime) {
    return row.totalCount;
  }
  return row.errorCount;
}

/**
 * Computes SLI, compliance and error-budget figures per service.
 */
export class SloEvaluator {
  constructor(private readonly config: SloConfig) {}

  /**
   * Window `(t_max - hours, t_max]` of the service table, or the whole snapshot
   */
  resolveWindow(snapshot: MetricSnapshot, hours?: number | null): EvaluationWindow {
    const end = snapshot.maxTimestamp('service');
    if (hours !== undefined && hours !== null) {
      return {
        start: end ? new Date(end.getTime() - hours * HOUR_MS) : null,
        end,
        hours: hours > 0 ? hours : null
      };
    }

    const start = snapshot.minTimestamp('service');
    const spanHours = start && end ? (end.getTime() - start.getTime()) / HOUR_MS : 0;
    return { start: null, end, hours: spanHours > 0 ? spanHours : null };
  }

  classifyBurn(multiple: number): BurnSeverity {
    const [warning, critical, emergency] = this.config.burnRateCutLines;
    if (multiple < warning) return 'healthy';
    if (multiple < critical) return 'warning';
    if (multiple < emergency) return 'critical';
    return 'emergency';
  }

  budgetStatus(consumed: number): BudgetStatus {
    if (consumed < 0) return 'surplus';
    if (consumed < 100) return 'consuming';
    return 'exhausted';
  }

  /**
   * Evaluate one service's rows. `rows` may be empty.
   */
  evaluateRows(
    service: string,
    rows: readonly ServiceMetricRecord[],
    window: EvaluationWindow
  ): ServiceEvaluation {
    const total = sum(rows.map(row => row.totalCount));
    if (total === 0) {
      return { status: 'insufficient_data', service, window, total_requests: 0, data_points: rows.length };
    }

    const targets = resolveTargets(rows, this.config);
    const violating = sum(rows.map(row => violatingRequests(row, targets)));
    const errors = sum(rows.map(row => row.errorCount));

    const sli = ((total - violating) * 100) / total;
    const allowedFailure = 100 - targets.compliancePercent;
    const consumed = ((targets.compliancePercent - sli) / allowedFailure) * 100;
    const multiple = (100 - sli) / allowedFailure;

    const errorRate = (errors * 100) / total;
    const avgResponse = mean(rows.map(row => row.responseTimeAvg));

    return {
      status: 'ok',
      service,
      window,
      sli_percent: sli,
      slo_target: targets.compliancePercent,
      is_violating: sli < targets.compliancePercent,
      error_budget_consumed_percent: consumed,
      error_budget_remaining_percent: 100 - consumed,
      budget_status: this.budgetStatus(consumed),
      burn_rate: window.hours === null ? null : consumed / window.hours,
      burn_rate_multiple: multiple,
      burn_severity: this.classifyBurn(multiple),
      total_requests: total,
      error_count: errors,
      violating_requests: violating,
      error_rate_percent: errorRate,
      error_rate_target: targets.errorRate,
      error_slo_met: errorRate <= targets.errorRate,
      avg_response_time: avgResponse,
      response_time_target: targets.responseTime,
      response_slo_met: avgResponse === null ? null : avgResponse <= targets.responseTime,
      data_points: rows.length
    };
  }

  /**
   * Evaluate every service in the snapshot (or one), ascending by name
   */
  evaluate(snapshot: MetricSnapshot, options: { service?: string; windowHours?: number | null } = {}): ServiceEvaluation[] {
    const window = this.resolveWindow(snapshot, options.windowHours);
    const grouped = snapshot.queryWindow('service', { start: window.start, end: window.end }, row => row.serviceName);
    const names = options.service !== undefined
      ? snapshot.serviceNames().filter(name => name === options.service)
      : snapshot.serviceNames();

    return names.map(name => this.evaluateRows(name, grouped.get(name) ?? [], window));
  }

  /**
   * Services whose SLI is below target, worst budget first, with the checks they fail
   */
  violations(snapshot: MetricSnapshot, windowHours?: number | null): SloViolation[] {
    const violations: SloViolation[] = [];

    for (const evaluation of this.evaluate(snapshot, { windowHours })) {
      if (evaluation.status !== 'ok' || !evaluation.is_violating) {
        continue;
      }
      const reasons = [
        `SLI ${evaluation.sli_percent.toFixed(2)}% is below target ${evaluation.slo_target.toFixed(2)}%`
      ];
      if (!evaluation.error_slo_met) {
        reasons.push(
          `Error rate ${evaluation.error_rate_percent.toFixed(2)}% exceeds target ${evaluation.error_rate_target.toFixed(2)}%`
        );
      }
      if (evaluation.response_slo_met === false && evaluation.avg_response_time !== null) {
        reasons.push(
          `Response time ${evaluation.avg_response_time.toFixed(3)}s exceeds target ${evaluation.response_time_target.toFixed(3)}s`
        );
      }
      violations.push({ ...evaluation, violations: reasons });
    }

    return violations.sort((a, b) =>
      b.error_budget_consumed_percent - a.error_budget_consumed_percent || compareNames(a.service, b.service)
    );
  }

  errorBudget(snapshot: MetricSnapshot, service: string, windowHours: number): ErrorBudgetReport | InsufficientData {
    const [evaluation] = this.evaluate(snapshot, { service, windowHours });
    if (!evaluation || evaluation.status !== 'ok') {
      return evaluation ?? {
        status: 'insufficient_data',
        service,
        window: this.resolveWindow(snapshot, windowHours),
        total_requests: 0,
        data_points: 0
      };
    }

    return {
      status: 'ok',
      service,
      time_window_hours: windowHours,
      window: evaluation.window,
      slo_target: evaluation.slo_target,
      sli_percent: evaluation.sli_percent,
      total_requests: evaluation.total_requests,
      violating_requests: evaluation.violating_requests,
      allowed_violating_requests: round((evaluation.total_requests * (100 - evaluation.slo_target)) / 100) ?? 0,
      error_budget_consumed_percent: evaluation.error_budget_consumed_percent,
      error_budget_remaining_percent: evaluation.error_budget_remaining_percent,
      budget_status: evaluation.budget_status,
      is_violating: evaluation.is_violating,
      burn_rate: evaluation.burn_rate,
      burn_rate_multiple: evaluation.burn_rate_multiple,
      burn_severity: evaluation.burn_severity
    };
  }
}
