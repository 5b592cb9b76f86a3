export { createAnalyticsEngine } from './engine.js';
export type { AnalyticsEngine } from './engine.js';

export * from './config/index.js';
export * from './store/index.js';
export * from './analytics/index.js';
export * from './tools/index.js';

export type { TelemetrySource, TelemetrySourceType } from './adapters/telemetrySource.js';
export { createTelemetrySource } from './adapters/factory.js';
export { OpenSearchTelemetrySource } from './adapters/opensearch/telemetrySource.js';
export type { OpenSearchSourceOptions } from './adapters/opensearch/telemetrySource.js';
export { OpenSearchCore, OpenSearchRequestError } from './adapters/opensearch/core/core.js';
export type { OpenSearchCoreOptions } from './adapters/opensearch/core/core.js';
export { JsonFileTelemetrySource } from './adapters/file/jsonFileSource.js';
export { flattenHit, flattenHits } from './adapters/hits.js';
export { IngestionScheduler } from './ingestion/scheduler.js';
export type { IngestionOutcome, IngestionSchedulerConfig } from './ingestion/scheduler.js';

export type * from './types/telemetry.js';
export {
  SloInsightError,
  ValidationError,
  LoadFailureError,
  UnknownOperationError,
  InvalidArgumentsError
} from './utils/errors.js';
export type { ErrorKind } from './utils/errors.js';
export { handleError, formatErrorOutput } from './utils/errorHandling.js';
export type { ErrorResponse } from './utils/errorHandling.js';
export { toJsonSafe } from './utils/jsonSafe.js';
export type { JsonValue } from './utils/jsonSafe.js';
