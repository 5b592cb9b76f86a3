import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import {
  Config,
  ConfigOverrides,
  ConnectionConfig,
  DegradationConfig,
  IngestionConfig,
  SloConfig
} from './types.js';
import { defaultConfig } from './defaults.js';
import { validateConfig } from './validators.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const positive = z.number().positive();

/**
 * Shape accepted from JSON configuration files. Unknown keys are dropped.
 */
const configFileSchema = z.object({
  source: z.enum(['opensearch', 'file']).optional(),
  serverName: z.string().min(1).optional(),
  connection: z.object({
    baseURL: z.string().url().optional(),
    apiKey: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    timeout: positive.optional(),
    maxRetries: z.number().int().nonnegative().optional(),
    retryDelay: positive.optional()
  }).optional(),
  ingestion: z.object({
    serviceIndex: z.string().min(1).optional(),
    errorIndex: z.string().min(1).optional(),
    serviceFile: z.string().min(1).optional(),
    errorFile: z.string().min(1).optional(),
    lookbackHours: positive.optional(),
    pageSize: z.number().int().positive().optional(),
    refreshIntervalMs: z.number().nonnegative().optional(),
    parseChunkSize: z.number().int().positive().optional(),
    errorRateTolerance: z.number().nonnegative().optional()
  }).optional(),
  slo: z.object({
    defaultErrorRateTarget: positive.optional(),
    defaultResponseTimeTarget: positive.optional(),
    defaultCompliancePercent: positive.optional(),
    defaultBudgetWindowHours: positive.optional(),
    burnRateCutLines: z.tuple([positive, positive, positive]).optional()
  }).optional(),
  degradation: z.object({
    windowMinutes: z.number().int().positive().optional(),
    thresholdPercent: positive.optional(),
    criticalMultiplier: positive.optional()
  }).optional(),
  trend: z.object({
    bucketMinutes: z.number().int().positive().optional(),
    lookbackHours: positive.optional(),
    horizonBuckets: z.number().int().positive().optional(),
    minBuckets: z.number().int().positive().optional(),
    riskCutLines: z.object({
      critical: z.number().nonnegative().optional(),
      high: z.number().nonnegative().optional(),
      medium: z.number().nonnegative().optional()
    }).optional(),
    approachFraction: positive.optional(),
    anomalyZScore: positive.optional()
  }).optional(),
  ranking: z.object({
    defaultLimit: z.number().int().positive().optional(),
    maxLimit: z.number().int().positive().optional()
  }).optional()
});

/**
 * Merge overrides section by section; keys absent from an override keep the base value
 */
export function mergeConfig(base: Config, overrides: ConfigOverrides): Config {
  return {
    source: overrides.source ?? base.source,
    serverName: overrides.serverName ?? base.serverName,
    connection: { ...base.connection, ...overrides.connection },
    ingestion: { ...base.ingestion, ...overrides.ingestion },
    slo: { ...base.slo, ...overrides.slo },
    degradation: { ...base.degradation, ...overrides.degradation },
    trend: {
      ...base.trend,
      ...overrides.trend,
      riskCutLines: { ...base.trend.riskCutLines, ...overrides.trend?.riskCutLines }
    },
    ranking: { ...base.ranking, ...overrides.ranking }
  };
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Environment variable ${name} must be numeric, got "${raw}"`, name);
  }
  return value;
}

function stringFromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw;
}

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const source = stringFromEnv(env, 'TELEMETRY_SOURCE');
  if (source !== undefined) {
    if (source !== 'opensearch' && source !== 'file') {
      throw new ValidationError(`TELEMETRY_SOURCE must be "opensearch" or "file", got "${source}"`, 'TELEMETRY_SOURCE');
    }
    overrides.source = source;
  }

  const serverName = stringFromEnv(env, 'SERVER_NAME');
  if (serverName !== undefined) {
    overrides.serverName = serverName;
  }

  const connection: Partial<ConnectionConfig> = {};
  setIfDefined(connection, 'baseURL', stringFromEnv(env, 'OPENSEARCH_URL'));
  setIfDefined(connection, 'username', stringFromEnv(env, 'OPENSEARCH_USERNAME'));
  setIfDefined(connection, 'password', stringFromEnv(env, 'OPENSEARCH_PASSWORD'));
  setIfDefined(connection, 'apiKey', stringFromEnv(env, 'OPENSEARCH_API_KEY'));
  if (Object.keys(connection).length > 0) {
    overrides.connection = connection;
  }

  const ingestion: Partial<IngestionConfig> = {};
  setIfDefined(ingestion, 'serviceIndex', stringFromEnv(env, 'OPENSEARCH_INDEX_SERVICE'));
  setIfDefined(ingestion, 'errorIndex', stringFromEnv(env, 'OPENSEARCH_INDEX_ERROR'));
  setIfDefined(ingestion, 'serviceFile', stringFromEnv(env, 'SERVICE_LOGS_FILE'));
  setIfDefined(ingestion, 'errorFile', stringFromEnv(env, 'ERROR_LOGS_FILE'));
  setIfDefined(ingestion, 'refreshIntervalMs', numberFromEnv(env, 'REFRESH_INTERVAL_MS'));
  if (Object.keys(ingestion).length > 0) {
    overrides.ingestion = ingestion;
  }

  const slo: Partial<SloConfig> = {};
  setIfDefined(slo, 'defaultErrorRateTarget', numberFromEnv(env, 'SLO_ERROR_RATE_TARGET'));
  setIfDefined(slo, 'defaultResponseTimeTarget', numberFromEnv(env, 'SLO_RESPONSE_TIME_TARGET'));
  setIfDefined(slo, 'defaultCompliancePercent', numberFromEnv(env, 'SLO_COMPLIANCE_PERCENT'));
  if (Object.keys(slo).length > 0) {
    overrides.slo = slo;
  }

  const degradation: Partial<DegradationConfig> = {};
  setIfDefined(degradation, 'windowMinutes', numberFromEnv(env, 'DEGRADATION_WINDOW_MINUTES'));
  setIfDefined(degradation, 'thresholdPercent', numberFromEnv(env, 'DEGRADATION_THRESHOLD_PERCENT'));
  if (Object.keys(degradation).length > 0) {
    overrides.degradation = degradation;
  }

  return overrides;
}

/**
 * Load configuration from a JSON file. Returns null when the file does not exist.
 */
export function loadFromFile(filePath: string): ConfigOverrides | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.error('Failed to read configuration file', { filePath, error });
    throw new ValidationError(
      `Configuration file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const parsed = configFileSchema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Configuration file ${filePath} is invalid: ${issues.join('; ')}`, filePath);
  }

  logger.info('Loaded configuration from file', { filePath });
  return parsed.data;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}

export interface ConfigLoadOptions {
  /** Candidate files, first existing wins */
  configPaths?: string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration loader
 */
export class ConfigLoader {
  static readonly defaultConfigPaths = [
    'slo-insight.config.json',
    '.slo-insight.json',
    join(process.env.HOME || '', '.slo-insight', 'config.json')
  ];

  /**
   * Resolve defaults, the first existing config file, the environment and
   * runtime overrides into one validated, frozen configuration
   */
  static load(overrides?: ConfigOverrides, options: ConfigLoadOptions = {}): Config {
    let config = mergeConfig(defaultConfig, {});

    for (const path of options.configPaths ?? this.defaultConfigPaths) {
      const fileConfig = loadFromFile(path);
      if (fileConfig) {
        config = mergeConfig(config, fileConfig);
        break;
      }
    }

    config = mergeConfig(config, loadFromEnv(options.env ?? process.env));

    if (overrides) {
      config = mergeConfig(config, overrides);
    }

    const errors = validateConfig(config);
    if (errors.hasErrors()) {
      throw new ValidationError(`Invalid configuration: ${errors.toString()}`);
    }

    logger.info('Configuration loaded successfully', {
      source: config.source,
      serverName: config.serverName,
      refreshIntervalMs: config.ingestion.refreshIntervalMs
    });

    return deepFreeze(config);
  }
}
