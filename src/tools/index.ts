export { registerToolsWithMCPServer as registerAllTools } from './registration.js';
export { ToolRegistry } from './base/registry.js';
export type { ToolFactory, ToolFactories } from './base/registry.js';
export { BaseTool, ToolCategory } from './base/tool.js';
export type { AnalyticsContext, Operation, ServiceNotFound, ToolMetadata } from './base/tool.js';
export { OperationDispatcher } from './dispatcher.js';
export type { DispatcherOptions, OperationDescriptor, OperationEnvelope } from './dispatcher.js';
export { OPERATION_FACTORIES, defaultToolRegistry } from './operations.js';
export { OPERATION_NAMES, isOperationName } from './operationNames.js';
export type { OperationName } from './operationNames.js';

export * from './slo/index.js';
export * from './degradation/index.js';
export * from './trends/index.js';
export * from './ranking/index.js';
