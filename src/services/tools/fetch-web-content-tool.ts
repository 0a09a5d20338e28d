// Web content tool
// Wraps the search gateway as the single tool the model may call

import type { ToolDefinition, ToolResult, ToolSpec } from './types.js';
import { toolError } from './types.js';
import type { SearchGateway } from '../web-search.js';

export const FETCH_WEB_CONTENT = 'fetch_web_content';

export const fetchWebContentSpec: ToolSpec = {
  name: FETCH_WEB_CONTENT,
  description: 'Retrieves info from website based on user queries',
  parameters: [
    {
      name: 'query',
      type: 'string',
      description: 'the search query or website to look up information about',
      required: true,
    },
  ],
};

export function createFetchWebContentTool(gateway: SearchGateway): ToolDefinition {
  return {
    ...fetchWebContentSpec,
    execute: async (args: Record<string, unknown>): Promise<ToolResult> => {
      const query = typeof args.query === 'string' ? args.query.trim() : '';
      if (!query) {
        return toolError('no query');
      }

      const results = await gateway.search(query);
      return { results };
    },
  };
}
