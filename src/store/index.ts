export { MetricStore } from './metricStore.js';
export type { LoadReport, MetricStoreOptions, RejectionReason, TableLoadCounts } from './metricStore.js';
export { MetricSnapshot } from './snapshot.js';
export type { WindowQuery } from './snapshot.js';
export { parseServiceRecord, parseErrorRecord, parseTimestamp } from './recordParser.js';
export type { ParseOptions } from './recordParser.js';
