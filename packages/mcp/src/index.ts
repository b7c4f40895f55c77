export * from './errors/tool-error.js';
export { toToolError } from './errors/to-tool-error.js';

export * from './bulk/bulk-result.js';
export { BulkOrchestrator, type ToolInvoker } from './bulk/bulk-orchestrator.js';

export * from './tools/parameters.js';
export { ToolArgs } from './tools/tool-args.js';
export { BaseDriveTool } from './tools/base-drive-tool.js';
export * from './tools/tool-context.js';
export { DRIVE_ADDRESS_PARAMETERS, driveAddress } from './tools/drive-address.js';
export * from './tools/index.js';

export { ToolCatalog } from './tool-catalog.js';
export { ToolDispatcher, type ToolDispatcherOptions } from './tool-dispatcher.js';
