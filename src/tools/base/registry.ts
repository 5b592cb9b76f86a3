import { AnalyticsContext, Operation, ToolCategory, ToolMetadata } from './tool.js';
import { OPERATION_NAMES, OperationName } from '../operationNames.js';
import { logger } from '../../utils/logger.js';

/**
 * Builds one operation for a context
 */
export type ToolFactory = (context: AnalyticsContext) => Operation;

/**
 * One factory per operation name; a missing name is a compile error
 */
export type ToolFactories = Readonly<Record<OperationName, ToolFactory>>;

/**
 * Tool registry for creating and organizing operations
 */
export class ToolRegistry {
  constructor(private readonly factories: ToolFactories) {}

  /**
   * Create tool instances for a context, checking each declares the name it is registered under
   */
  createTools(context: AnalyticsContext): Map<OperationName, Operation> {
    const instances = new Map<OperationName, Operation>();

    for (const name of OPERATION_NAMES) {
      const tool = this.factories[name](context);
      const declared = tool.getMetadata().name;
      if (declared !== name) {
        throw new Error(`Tool registered as ${name} declares the name ${declared}`);
      }
      instances.set(name, tool);
      logger.debug(`Created tool instance: ${name}`);
    }

    logger.info(`Created ${instances.size} tool instances`);
    return instances;
  }

  /**
   * Get tools organized by category
   */
  static byCategory(tools: Iterable<ToolMetadata>): Record<ToolCategory, ToolMetadata[]> {
    const result: Record<ToolCategory, ToolMetadata[]> = {
      [ToolCategory.SLO]: [],
      [ToolCategory.DEGRADATION]: [],
      [ToolCategory.TRENDS]: [],
      [ToolCategory.RANKING]: []
    };

    for (const metadata of tools) {
      result[metadata.category].push(metadata);
    }

    return result;
  }
}
