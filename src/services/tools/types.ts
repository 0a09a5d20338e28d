// Tool system types and interfaces

import { z } from 'zod';
import type { SearchResult } from '../web-search.js';

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
}

/** What the model is told about a tool. */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export interface ToolDefinition extends ToolSpec {
  execute: (args: Record<string, unknown>) => Promise<ToolResult>;
}

export interface ToolInvocation {
  name: string;
  parameters: Record<string, unknown>;
}

export interface ToolSuccess {
  results: SearchResult[];
}

export interface ToolFailure {
  error: string;
}

export type ToolResult = ToolSuccess | ToolFailure;

export function isToolFailure(result: ToolResult): result is ToolFailure {
  return 'error' in result;
}

export function toolError(error: string): ToolFailure {
  return { error };
}

export const SearchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  description: z.string(),
});

// Wire shape of a tool result. Error bodies may carry extra fields (the service adds `code`),
// which are dropped; a results body must be exactly that
export const ToolResultSchema = z.union([
  z.object({ results: z.array(SearchResultSchema) }).strict(),
  z.object({ error: z.string() }),
]);

export const ToolInvocationSchema = z.object({
  name: z.string().min(1, 'name is required'),
  parameters: z.record(z.unknown()).default({}),
});
