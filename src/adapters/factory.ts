import type { Config } from '../config/types.js';
import { TelemetrySource } from './telemetrySource.js';
import { OpenSearchTelemetrySource } from './opensearch/telemetrySource.js';
import { JsonFileTelemetrySource } from './file/jsonFileSource.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Creates the telemetry source named by `config.source`
 * @throws ValidationError when the source lacks its location
 */
export function createTelemetrySource(config: Config): TelemetrySource {
  logger.info('Creating telemetry source', { source: config.source });

  switch (config.source) {
    case 'opensearch': {
      const { baseURL } = config.connection;
      if (!baseURL) {
        throw new ValidationError('connection.baseURL is required for the opensearch source', 'connection.baseURL');
      }
      return new OpenSearchTelemetrySource({
        ...config.connection,
        baseURL,
        serviceIndex: config.ingestion.serviceIndex,
        errorIndex: config.ingestion.errorIndex,
        lookbackHours: config.ingestion.lookbackHours,
        pageSize: config.ingestion.pageSize
      });
    }
    case 'file': {
      const { serviceFile, errorFile } = config.ingestion;
      if (!serviceFile) {
        throw new ValidationError('ingestion.serviceFile is required for the file source', 'ingestion.serviceFile');
      }
      return new JsonFileTelemetrySource({ serviceFile, errorFile });
    }
  }
}
