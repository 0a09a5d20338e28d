// Dispatcher Module - Main exports

export { ToolDispatcher, DISPATCH_ERRORS, computeBackoffMs } from './tool-dispatcher.js';
export type { ToolExecutor, ToolDispatcherDeps, Sleep } from './tool-dispatcher.js';
