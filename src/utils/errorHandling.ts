import { logger } from './logger.js';
import { SloInsightError } from './errors.js';
import type { ErrorKind } from './errors.js';
import type { MCPToolOutput } from '../types.js';

/**
 * Standard error response format for the dispatcher and the MCP surface
 */
export interface ErrorResponse {
  error: true;
  kind: ErrorKind | 'InternalError';
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Creates a standardized error response object
 */
export function createErrorResponse(
  kind: ErrorResponse['kind'],
  message: string,
  details?: Record<string, unknown>
): ErrorResponse {
  return details ? { error: true, kind, message, details } : { error: true, kind, message };
}

/**
 * Handles errors in a consistent way across the codebase
 * @param error Error object or string
 * @param context Additional context for the error
 */
export function handleError(error: unknown, context?: string): ErrorResponse {
  const contextPrefix = context ? `[${context}] ` : '';

  if (error instanceof SloInsightError) {
    logger.warn(`${contextPrefix}${error.message}`, { kind: error.kind });
    return createErrorResponse(error.kind, error.message, error.details);
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(`${contextPrefix}${errorMessage}`);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }

  return createErrorResponse('InternalError', `${contextPrefix}${errorMessage}`);
}

const SUGGESTIONS: Record<ErrorResponse['kind'], string[]> = {
  UnknownOperation: [
    'Call list_operations to see the registered operation names'
  ],
  InvalidArguments: [
    'Check required parameters such as service_name',
    'Limits and windows must be positive integers within the documented range'
  ],
  LoadFailure: [
    'The previous telemetry snapshot is still being served',
    'Verify the telemetry source returns rows with a parseable record_time'
  ],
  ValidationError: [],
  InternalError: []
};

/**
 * Format an error into an MCP tool result carrying the error response as JSON
 */
export function formatErrorOutput(error: unknown, context?: string): MCPToolOutput {
  const response = handleError(error, context);
  const suggestions = SUGGESTIONS[response.kind];

  return {
    content: [{
      type: 'text',
      text: JSON.stringify(suggestions.length > 0 ? { ...response, suggestions } : response)
    }],
    isError: true
  };
}
