import type { z } from 'zod';

// Content items returned by MCP tools. Operations only ever answer with text.
export type MCPToolContentItem = { type: 'text'; text: string };

export type MCPToolOutput = {
  content: MCPToolContentItem[];
  isError?: boolean;
};

export type MCPToolSchema<TSchema extends z.ZodRawShape> = z.infer<z.ZodObject<TSchema>>;
