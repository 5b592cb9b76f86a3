import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { OperationDispatcher, OperationDescriptor } from './dispatcher.js';
import { ToolCategory } from './base/tool.js';
import { MCPToolOutput } from '../types.js';
import { formatErrorOutput } from '../utils/errorHandling.js';
import { logger } from '../utils/logger.js';

export interface ParameterDescription {
  name: string;
  description: string | null;
  required: boolean;
}

function describeParameters(shape: z.ZodRawShape): ParameterDescription[] {
  return Object.entries(shape).map(([name, schema]) => ({
    name,
    description: schema.description ?? null,
    required: !schema.isOptional()
  }));
}

function describeOperation(operation: OperationDescriptor) {
  return {
    name: operation.name,
    category: operation.category,
    description: operation.description,
    parameters: describeParameters(operation.parameters)
  };
}

const textOutput = (value: unknown): MCPToolOutput => ({
  content: [{ type: 'text', text: JSON.stringify(value, null, 2) }]
});

/**
 * Register every operation, plus list_operations, with the MCP server
 */
export function registerToolsWithMCPServer(server: McpServer, dispatcher: OperationDispatcher): void {
  const operations = dispatcher.list();

  logger.info(`Registering ${operations.length} tools with MCP server`);

  for (const operation of operations) {
    server.tool(
      operation.name,
      operation.description,
      operation.parameters,
      async args => {
        try {
          return textOutput(dispatcher.execute(operation.name, args));
        } catch (error) {
          return formatErrorOutput(error, operation.name);
        }
      }
    );
  }

  server.tool(
    'list_operations',
    'List the available SLO analytics operations with their parameters',
    {
      category: z.union([z.nativeEnum(ToolCategory), z.literal('all')])
        .optional()
        .describe('Filter operations by category')
    },
    async ({ category }) => {
      const selected = category && category !== 'all'
        ? operations.filter(operation => operation.category === category)
        : operations;

      return textOutput({
        category: category ?? 'all',
        operations: selected.map(describeOperation)
      });
    }
  );
}
