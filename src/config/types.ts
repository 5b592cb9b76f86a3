/**
 * Configuration types for the SLO insight server
 */

export type TelemetrySourceKind = 'opensearch' | 'file';

export interface ConnectionConfig {
  baseURL?: string;
  apiKey?: string;
  username?: string;
  password?: string;
  timeout: number;
  maxRetries: number;
  retryDelay: number;
}

export interface IngestionConfig {
  serviceIndex: string;
  errorIndex: string;
  serviceFile?: string;
  errorFile?: string;
  /** Hours of history fetched from the source per cycle */
  lookbackHours: number;
  pageSize: number;
  /** 0 disables the periodic refresh */
  refreshIntervalMs: number;
  parseChunkSize: number;
  /** Allowed disagreement, in percentage points, between a supplied error rate and the counts */
  errorRateTolerance: number;
}

export interface SloConfig {
  defaultErrorRateTarget: number;
  defaultResponseTimeTarget: number;
  defaultCompliancePercent: number;
  defaultBudgetWindowHours: number;
  /** Ascending burn-rate multiples separating healthy | warning | critical | emergency */
  burnRateCutLines: [number, number, number];
}

export interface DegradationConfig {
  windowMinutes: number;
  thresholdPercent: number;
  /** A change at or above threshold × multiplier is critical */
  criticalMultiplier: number;
}

export interface RiskCutLines {
  critical: number;
  high: number;
  medium: number;
}

export interface TrendConfig {
  bucketMinutes: number;
  lookbackHours: number;
  horizonBuckets: number;
  minBuckets: number;
  /** Buckets-to-breach at or below which each risk level applies */
  riskCutLines: RiskCutLines;
  approachFraction: number;
  anomalyZScore: number;
}

export interface RankingConfig {
  defaultLimit: number;
  maxLimit: number;
}

export interface Config {
  source: TelemetrySourceKind;
  serverName: string;
  connection: ConnectionConfig;
  ingestion: IngestionConfig;
  slo: SloConfig;
  degradation: DegradationConfig;
  trend: TrendConfig;
  ranking: RankingConfig;
}

export interface ConfigOverrides {
  source?: TelemetrySourceKind;
  serverName?: string;
  connection?: Partial<ConnectionConfig>;
  ingestion?: Partial<IngestionConfig>;
  slo?: Partial<SloConfig>;
  degradation?: Partial<DegradationConfig>;
  trend?: Partial<Omit<TrendConfig, 'riskCutLines'>> & { riskCutLines?: Partial<RiskCutLines> };
  ranking?: Partial<RankingConfig>;
}
