#!/usr/bin/env node
// MCP server over stdio exposing the SLO analytics operations
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { ConfigLoader } from './config/index.js';
import { createAnalyticsEngine } from './engine.js';
import { createTelemetrySource } from './adapters/factory.js';
import { IngestionScheduler } from './ingestion/scheduler.js';
import { registerAllTools, ToolCategory, ToolRegistry } from './tools/index.js';
import { logger } from './utils/logger.js';

const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  const config = ConfigLoader.load();

  logger.info('Starting SLO insight server', {
    source: config.source,
    url: config.connection.baseURL,
    serviceFile: config.ingestion.serviceFile,
    hasApiKey: Boolean(config.connection.apiKey),
    hasCredentials: Boolean(config.connection.username && config.connection.password)
  });

  const engine = createAnalyticsEngine(config);
  const source = createTelemetrySource(config);
  const scheduler = new IngestionScheduler(source, engine.store, {
    refreshIntervalMs: config.ingestion.refreshIntervalMs
  });

  // An empty snapshot still answers with insufficient_data, so a failed first load is not fatal
  const initial = await scheduler.runOnce();
  if (initial.status === 'failed') {
    logger.warn('Initial telemetry load failed, serving an empty snapshot', { error: initial.error });
  }
  scheduler.start();

  const server = new McpServer({
    name: config.serverName,
    version: SERVER_VERSION
  });

  registerAllTools(server, engine.dispatcher);

  const byCategory = ToolRegistry.byCategory(engine.dispatcher.list());
  logger.info('Available operations by category', {
    slo: byCategory[ToolCategory.SLO].map(tool => tool.name),
    degradation: byCategory[ToolCategory.DEGRADATION].map(tool => tool.name),
    trends: byCategory[ToolCategory.TRENDS].map(tool => tool.name),
    ranking: byCategory[ToolCategory.RANKING].map(tool => tool.name)
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    await scheduler.stop();
    await source.close?.();
    await server.close();
    process.exit(0);
  };
  const onSignal = (signal: string) => () => {
    shutdown(signal).catch(error => {
      logger.error('Error during shutdown', { error });
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal('SIGINT'));
  process.once('SIGTERM', onSignal('SIGTERM'));

  await server.connect(new StdioServerTransport());
  logger.info(`MCP server started with name: ${config.serverName}, version: ${SERVER_VERSION}`);
}

main().catch(err => {
  logger.error('Error during server startup:', { error: err });
  process.exit(1);
});
