import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TelemetrySource } from '../telemetrySource.js';
import { flattenHits, searchResponseSchema } from '../hits.js';
import type { RawRecord, TelemetryBatch } from '../../types/telemetry.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// An exported search response, or rows that are already flat
const exportSchema = z.union([searchResponseSchema, z.array(z.record(z.unknown()))]);

export interface JsonFileSourceOptions {
  serviceFile: string;
  errorFile?: string;
}

/**
 * Replays search responses exported to JSON files
 */
export class JsonFileTelemetrySource implements TelemetrySource {
  constructor(private readonly options: JsonFileSourceOptions) {}

  getType(): 'file' {
    return 'file';
  }

  async fetchBatch(): Promise<TelemetryBatch> {
    const service = await this.readRows(this.options.serviceFile);
    const error = this.options.errorFile ? await this.readRows(this.options.errorFile) : [];

    logger.info('Read telemetry export files', {
      serviceFile: this.options.serviceFile,
      errorFile: this.options.errorFile,
      service: service.length,
      error: error.length
    });

    return { service, error };
  }

  /**
   * @throws ValidationError when the file is not JSON or not a search export
   */
  private async readRows(path: string): Promise<RawRecord[]> {
    const text = await readFile(path, 'utf8');

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(
        `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        path
      );
    }

    const parsed = exportSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`${path} is not a search response export: ${parsed.error.message}`, path);
    }

    return Array.isArray(parsed.data) ? parsed.data : flattenHits(parsed.data.hits.hits);
  }
}
