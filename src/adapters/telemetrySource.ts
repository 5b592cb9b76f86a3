import type { TelemetryBatch } from '../types/telemetry.js';

export type TelemetrySourceType = 'opensearch' | 'file';

/**
 * Anything that can hand the ingestion scheduler a fresh batch of both tables
 */
export interface TelemetrySource {
  getType(): TelemetrySourceType;

  /**
   * Fetch the latest rows of the service and error tables, flattened for the parser
   */
  fetchBatch(): Promise<TelemetryBatch>;

  /**
   * Release any connection or server-side context the source holds
   */
  close?(): Promise<void>;
}
