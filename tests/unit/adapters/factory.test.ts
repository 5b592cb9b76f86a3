import { describe, it, expect } from 'vitest';
import { createTelemetrySource } from '../../../src/adapters/factory.js';
import { JsonFileTelemetrySource } from '../../../src/adapters/file/jsonFileSource.js';
import { OpenSearchTelemetrySource } from '../../../src/adapters/opensearch/telemetrySource.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { testConfig } from '../helpers/telemetry.js';

describe('createTelemetrySource', () => {
  it('creates the source named by the configuration', () => {
    const search = createTelemetrySource(testConfig({ connection: { baseURL: 'http://opensearch.test:9200' } }));
    const file = createTelemetrySource(testConfig({ source: 'file', ingestion: { serviceFile: 'service.json' } }));

    expect(search).toBeInstanceOf(OpenSearchTelemetrySource);
    expect(search.getType()).toBe('opensearch');
    expect(file).toBeInstanceOf(JsonFileTelemetrySource);
    expect(file.getType()).toBe('file');
  });

  it('requires a location for each source', () => {
    expect(() => createTelemetrySource(testConfig())).toThrow(ValidationError);
    expect(() => createTelemetrySource(testConfig({ source: 'file' })))
      .toThrow('ingestion.serviceFile is required for the file source');
  });
});
