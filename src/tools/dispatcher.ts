import type { z } from 'zod';
import { AnalyticsContext, Operation, ToolMetadata } from './base/tool.js';
import { ToolRegistry } from './base/registry.js';
import { defaultToolRegistry } from './operations.js';
import { OPERATION_NAMES, OperationName, isOperationName } from './operationNames.js';
import { UnknownOperationError } from '../utils/errors.js';
import { JsonValue, toJsonSafe } from '../utils/jsonSafe.js';

export interface OperationEnvelope {
  operation: OperationName;
  result: JsonValue;
  generated_at: string;
}

export interface OperationDescriptor extends ToolMetadata {
  parameters: z.ZodRawShape;
}

export interface DispatcherOptions {
  registry?: ToolRegistry;
  clock?: () => Date;
}

/**
 * Routes named operations to their tools. Each call reads the store's
 * snapshot once, so a concurrent reload never changes a result mid-computation.
 */
export class OperationDispatcher {
  private readonly tools: Map<OperationName, Operation>;
  private readonly clock: () => Date;

  constructor(private readonly context: AnalyticsContext, options: DispatcherOptions = {}) {
    this.tools = (options.registry ?? defaultToolRegistry).createTools(context);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * @throws UnknownOperationError for a name outside the registry
   * @throws InvalidArgumentsError when the arguments fail validation
   */
  execute(name: string, args: unknown = {}): OperationEnvelope {
    const tool = isOperationName(name) ? this.tools.get(name) : undefined;
    if (!isOperationName(name) || !tool) {
      throw new UnknownOperationError(name, OPERATION_NAMES);
    }

    const snapshot = this.context.store.snapshot();
    const result = tool.run(args, snapshot);

    return {
      operation: name,
      result: toJsonSafe(result),
      generated_at: this.clock().toISOString()
    };
  }

  get(name: OperationName): Operation | undefined {
    return this.tools.get(name);
  }

  list(): OperationDescriptor[] {
    return OPERATION_NAMES.flatMap(name => {
      const tool = this.tools.get(name);
      return tool ? [{ ...tool.getMetadata(), parameters: tool.getParameterSchema() }] : [];
    });
  }
}
