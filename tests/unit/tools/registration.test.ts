import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { registerAllTools } from '../../../src/tools/index.js';
import { createAnalyticsEngine } from '../../../src/engine.js';
import { serviceRow, testConfig } from '../helpers/telemetry.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional()
});

describe('registerAllTools', () => {
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    const engine = createAnalyticsEngine(testConfig(), { clock: () => new Date('2025-01-15T12:30:00.000Z') });
    await engine.store.load([serviceRow({ service: 'payments', offsetMs: 0 })], []);

    server = new McpServer({ name: 'slo-insight-test', version: '0.0.0' });
    registerAllTools(server, engine.dispatcher);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const body: unknown = JSON.parse(result.content[0].text);
    return { isError: result.isError ?? false, body };
  }

  it('exposes every operation plus list_operations', async () => {
    const { tools } = await client.listTools();
    expect(tools).toHaveLength(15);
    expect(tools.map(tool => tool.name)).toContain('get_historical_patterns');
    expect(tools.map(tool => tool.name)).toContain('list_operations');
  });

  it('answers an operation with its envelope', async () => {
    const { isError, body } = await call('get_current_sli', { service_name: 'checkout' });

    expect(isError).toBe(false);
    expect(body).toEqual({
      operation: 'get_current_sli',
      result: {
        status: 'not_found',
        service: 'checkout',
        message: 'Service checkout is not present in the current snapshot'
      },
      generated_at: '2025-01-15T12:30:00.000Z'
    });
  });

  it('lists operations by category', async () => {
    const { body } = await call('list_operations', { category: 'trends' });

    expect(body).toMatchObject({
      category: 'trends',
      operations: [
        { name: 'predict_issues_today', category: 'trends' },
        { name: 'get_historical_patterns', category: 'trends' }
      ]
    });
  });
});
