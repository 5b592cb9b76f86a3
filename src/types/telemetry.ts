/**
 * Telemetry domain types shared by the store, the analytics and the sources.
 */

/**
 * One loosely-typed record as delivered by a telemetry source. Unknown keys
 * are ignored by the parser.
 */
export type RawRecord = Readonly<Record<string, unknown>>;

export interface TelemetryBatch {
  service: RawRecord[];
  error: RawRecord[];
}

/**
 * One observation window for one service.
 *
 * Nullable numerics are "unknown" and are excluded from averages; counts are
 * never null (absent counts are parsed as zero).
 */
export interface ServiceMetricRecord {
  readonly id: string;
  readonly serviceName: string;
  readonly appId: string | null;
  readonly sid: string | null;
  readonly totalCount: number;
  readonly successCount: number;
  readonly errorCount: number;
  readonly naErrorCount: number;
  /** Percentage in [0, 100] */
  readonly errorRate: number | null;
  /** Percentage in [0, 100] */
  readonly successRate: number | null;
  /** Seconds */
  readonly responseTimeAvg: number | null;
  readonly responseTimeMin: number | null;
  readonly responseTimeMax: number | null;
  readonly responseTimeP95: number | null;
  readonly responseTimeP99: number | null;
  readonly targetErrorSloPerc: number | null;
  readonly targetResponseSloSec: number | null;
  readonly responseTargetPercent: number | null;
  readonly recordTime: Date;
}

export interface ErrorMetricRecord {
  readonly id: string;
  readonly wmApplicationId: string | null;
  readonly wmApplicationName: string | null;
  readonly wmTransactionId: string | null;
  readonly wmTransactionName: string | null;
  readonly errorCodes: readonly string[];
  readonly technicalErrorCount: number;
  readonly businessErrorCount: number;
  readonly errorCount: number;
  readonly totalCount: number;
  readonly responseTimeAvg: number | null;
  readonly recordTime: Date;
}

export interface TableRows {
  service: ServiceMetricRecord;
  error: ErrorMetricRecord;
}

export type TableName = keyof TableRows;

export type TableRow<T extends TableName> = TableRows[T];

/**
 * Half-open time window `(start, end]`; a missing bound is unbounded.
 */
export interface TimeWindow {
  start?: Date | null;
  end?: Date | null;
}
