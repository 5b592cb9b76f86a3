import { Config } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: Config = {
  source: 'opensearch',
  serverName: 'slo-insight-server',
  connection: {
    timeout: 30000,
    maxRetries: 3,
    retryDelay: 1000
  },
  ingestion: {
    serviceIndex: 'service-metrics',
    errorIndex: 'service-metrics-error',
    lookbackHours: 4,
    pageSize: 1000,
    refreshIntervalMs: 300000, // 5 minutes
    parseChunkSize: 500,
    errorRateTolerance: 1.0
  },
  slo: {
    defaultErrorRateTarget: 1.0, // percent
    defaultResponseTimeTarget: 1.0, // seconds
    defaultCompliancePercent: 98,
    defaultBudgetWindowHours: 4,
    burnRateCutLines: [1, 2, 10]
  },
  degradation: {
    windowMinutes: 30,
    thresholdPercent: 20,
    criticalMultiplier: 2
  },
  trend: {
    bucketMinutes: 60,
    lookbackHours: 24,
    horizonBuckets: 6,
    minBuckets: 3,
    riskCutLines: {
      critical: 1,
      high: 3,
      medium: 6
    },
    approachFraction: 0.8,
    anomalyZScore: 2
  },
  ranking: {
    defaultLimit: 10,
    maxLimit: 100
  }
};
