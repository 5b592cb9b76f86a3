import { Config } from './types.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration errors collection
 */
export class ConfigErrors {
  private errors: string[] = [];

  add(error: string): void {
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): string[] {
    return [...this.errors];
  }

  toString(): string {
    return this.errors.join('; ');
  }
}

function requirePositive(value: number, name: string, errors: ConfigErrors): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.add(`${name} must be a positive number`);
  }
}

function requirePositiveInteger(value: number, name: string, errors: ConfigErrors): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.add(`${name} must be a positive integer`);
  }
}

/**
 * Validate the telemetry source and its connection settings
 */
function validateSource(config: Config, errors: ConfigErrors): void {
  if (!['opensearch', 'file'].includes(config.source)) {
    errors.add('Invalid telemetry source');
  }

  if (config.source === 'opensearch') {
    if (!config.connection.baseURL) {
      errors.add('Connection baseURL is required for the opensearch source');
    }
    if (config.connection.timeout < 1000) {
      errors.add('Connection timeout must be at least 1000ms');
    }
    if (config.connection.maxRetries < 0) {
      errors.add('Connection maxRetries cannot be negative');
    }
    if (config.connection.retryDelay < 100) {
      errors.add('Connection retryDelay must be at least 100ms');
    }
  }

  if (config.source === 'file' && !config.ingestion.serviceFile) {
    errors.add('Ingestion serviceFile is required for the file source');
  }
}

function validateIngestion(config: Config, errors: ConfigErrors): void {
  const { ingestion } = config;

  if (!ingestion.serviceIndex || !ingestion.errorIndex) {
    errors.add('Ingestion serviceIndex and errorIndex are required');
  }
  requirePositive(ingestion.lookbackHours, 'Ingestion lookbackHours', errors);
  requirePositiveInteger(ingestion.pageSize, 'Ingestion pageSize', errors);
  if (ingestion.pageSize > 10000) {
    errors.add('Ingestion pageSize cannot exceed 10000');
  }
  if (!Number.isFinite(ingestion.refreshIntervalMs) || ingestion.refreshIntervalMs < 0) {
    errors.add('Ingestion refreshIntervalMs cannot be negative');
  }
  requirePositiveInteger(ingestion.parseChunkSize, 'Ingestion parseChunkSize', errors);
  if (!Number.isFinite(ingestion.errorRateTolerance) || ingestion.errorRateTolerance < 0) {
    errors.add('Ingestion errorRateTolerance cannot be negative');
  }
}

function validateSlo(config: Config, errors: ConfigErrors): void {
  const { slo } = config;

  if (!(slo.defaultErrorRateTarget > 0 && slo.defaultErrorRateTarget <= 100)) {
    errors.add('SLO defaultErrorRateTarget must be within (0, 100]');
  }
  requirePositive(slo.defaultResponseTimeTarget, 'SLO defaultResponseTimeTarget', errors);
  if (!(slo.defaultCompliancePercent > 0 && slo.defaultCompliancePercent < 100)) {
    errors.add('SLO defaultCompliancePercent must be within (0, 100)');
  }
  requirePositive(slo.defaultBudgetWindowHours, 'SLO defaultBudgetWindowHours', errors);

  const [warning, critical, emergency] = slo.burnRateCutLines;
  if (!(warning > 0 && warning < critical && critical < emergency)) {
    errors.add('SLO burnRateCutLines must be positive and strictly ascending');
  }
}

function validateDegradation(config: Config, errors: ConfigErrors): void {
  requirePositiveInteger(config.degradation.windowMinutes, 'Degradation windowMinutes', errors);
  requirePositive(config.degradation.thresholdPercent, 'Degradation thresholdPercent', errors);
  if (!(config.degradation.criticalMultiplier >= 1)) {
    errors.add('Degradation criticalMultiplier must be at least 1');
  }
}

function validateTrend(config: Config, errors: ConfigErrors): void {
  const { trend } = config;

  requirePositiveInteger(trend.bucketMinutes, 'Trend bucketMinutes', errors);
  requirePositive(trend.lookbackHours, 'Trend lookbackHours', errors);
  requirePositiveInteger(trend.horizonBuckets, 'Trend horizonBuckets', errors);
  if (!Number.isInteger(trend.minBuckets) || trend.minBuckets < 3) {
    errors.add('Trend minBuckets must be an integer of at least 3');
  }
  if (trend.lookbackHours * 60 < trend.bucketMinutes * trend.minBuckets) {
    errors.add('Trend lookbackHours must cover at least minBuckets buckets');
  }

  const { critical, high, medium } = trend.riskCutLines;
  if (!(critical >= 0 && critical <= high && high <= medium)) {
    errors.add('Trend riskCutLines must satisfy 0 <= critical <= high <= medium');
  }
  if (!(trend.approachFraction > 0 && trend.approachFraction <= 1)) {
    errors.add('Trend approachFraction must be within (0, 1]');
  }
  requirePositive(trend.anomalyZScore, 'Trend anomalyZScore', errors);
}

function validateRanking(config: Config, errors: ConfigErrors): void {
  requirePositiveInteger(config.ranking.defaultLimit, 'Ranking defaultLimit', errors);
  requirePositiveInteger(config.ranking.maxLimit, 'Ranking maxLimit', errors);
  if (config.ranking.defaultLimit > config.ranking.maxLimit) {
    errors.add('Ranking defaultLimit cannot exceed maxLimit');
  }
}

/**
 * Validate a complete configuration
 */
export function validateConfig(config: Config): ConfigErrors {
  const errors = new ConfigErrors();

  validateSource(config, errors);
  validateIngestion(config, errors);
  validateSlo(config, errors);
  validateDegradation(config, errors);
  validateTrend(config, errors);
  validateRanking(config, errors);

  if (errors.hasErrors()) {
    logger.error('Configuration validation failed', { errors: errors.getErrors() });
  }

  return errors;
}
