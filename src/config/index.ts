/**
 * Configuration module exports
 */

export { ConfigLoader, mergeConfig, loadFromEnv, loadFromFile } from './loader.js';
export type { ConfigLoadOptions } from './loader.js';
export { defaultConfig } from './defaults.js';
export { validateConfig, ConfigErrors } from './validators.js';
export type {
  Config,
  ConfigOverrides,
  ConnectionConfig,
  IngestionConfig,
  SloConfig,
  DegradationConfig,
  TrendConfig,
  RiskCutLines,
  RankingConfig,
  TelemetrySourceKind
} from './types.js';
