// Tool System Initialization

import { ToolRegistry } from './registry.js';
import { createFetchWebContentTool } from './fetch-web-content-tool.js';
import type { SearchGateway } from '../web-search.js';
import { createChildLogger } from '../../logger.js';

const log = createChildLogger('tools');

export { ToolRegistry, toAnthropicTool } from './registry.js';
export type { AnthropicToolDef } from './registry.js';
export { FETCH_WEB_CONTENT, fetchWebContentSpec, createFetchWebContentTool } from './fetch-web-content-tool.js';
export type {
  ToolDefinition,
  ToolInvocation,
  ToolParameter,
  ToolResult,
  ToolSpec,
  ToolSuccess,
  ToolFailure,
} from './types.js';
export { isToolFailure, toolError, ToolResultSchema, ToolInvocationSchema } from './types.js';

export function initializeTools(gateway: SearchGateway): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(createFetchWebContentTool(gateway));

  const registeredTools = registry.getAll();
  log.info({ tools: registeredTools.map(t => t.name) }, `Tool system initialized with ${registeredTools.length} tool(s)`);

  return registry;
}
