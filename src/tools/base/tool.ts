import { z } from 'zod';
import type { Config } from '../../config/types.js';
import type { MetricStore } from '../../store/metricStore.js';
import type { MetricSnapshot } from '../../store/snapshot.js';
import type {
  AggregateRanker,
  DegradationDetector,
  SloEvaluator,
  TrendPredictor
} from '../../analytics/index.js';
import type { OperationName } from '../operationNames.js';
import { MCPToolSchema } from '../../types.js';
import { InvalidArgumentsError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Tool category for organization
 */
export enum ToolCategory {
  SLO = 'slo',
  DEGRADATION = 'degradation',
  TRENDS = 'trends',
  RANKING = 'ranking'
}

/**
 * Tool metadata interface
 */
export interface ToolMetadata {
  name: OperationName;
  category: ToolCategory;
  description: string;
}

/**
 * Collaborators every operation is built with
 */
export interface AnalyticsContext {
  config: Config;
  store: MetricStore;
  evaluator: SloEvaluator;
  detector: DegradationDetector;
  predictor: TrendPredictor;
  ranker: AggregateRanker;
}

/**
 * Result state for single-service operations naming a service the snapshot does not know
 */
export interface ServiceNotFound {
  status: 'not_found';
  service: string;
  message: string;
}

/**
 * What the dispatcher and the MCP layer need from any tool, whatever its schema
 */
export interface Operation {
  getMetadata(): ToolMetadata;
  getParameterSchema(): z.ZodRawShape;
  run(args: unknown, snapshot: MetricSnapshot): unknown;
}

/**
 * Base class for all operations with Zod schema validation
 */
export abstract class BaseTool<TSchema extends z.ZodRawShape, TResult = unknown> implements Operation {
  protected context: AnalyticsContext;
  protected metadata: ToolMetadata;

  constructor(context: AnalyticsContext, metadata: ToolMetadata) {
    this.context = context;
    this.metadata = metadata;
  }

  /**
   * Get the schema for this tool
   */
  protected abstract getSchema(): TSchema;

  /**
   * Get tool metadata
   */
  getMetadata(): ToolMetadata {
    return this.metadata;
  }

  /**
   * Get the parameter schema for MCP
   */
  getParameterSchema(): TSchema {
    return this.getSchema();
  }

  /**
   * Validate raw arguments against the schema, applying defaults
   * @throws InvalidArgumentsError
   */
  parseArgs(args: unknown): MCPToolSchema<TSchema> {
    const parsed = z.object(this.getSchema()).safeParse(args ?? {});
    if (!parsed.success) {
      logger.debug(`Tool ${this.metadata.name} rejected args`, { args, issues: parsed.error.issues });
      throw new InvalidArgumentsError(this.metadata.name, parsed.error.issues);
    }
    return parsed.data;
  }

  /**
   * Validate and execute against one snapshot
   */
  run(args: unknown, snapshot: MetricSnapshot): TResult {
    const validatedArgs = this.parseArgs(args);

    logger.info(`Executing tool ${this.metadata.name}`, {
      category: this.metadata.category,
      generation: snapshot.generation,
      args: validatedArgs
    });

    const result = this.executeImpl(validatedArgs, snapshot);

    logger.debug(`Tool ${this.metadata.name} executed successfully`);
    return result;
  }

  /**
   * Execute the tool implementation - must be implemented by subclasses
   */
  protected abstract executeImpl(args: MCPToolSchema<TSchema>, snapshot: MetricSnapshot): TResult;

  protected notFound(service: string): ServiceNotFound {
    return {
      status: 'not_found',
      service,
      message: `Service ${service} is not present in the current snapshot`
    };
  }
}
