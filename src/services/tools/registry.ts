// Tool Registry - Central registry for the tools the tool service exposes

import type { ToolDefinition, ToolParameter, ToolSpec } from './types.js';
import { createChildLogger } from '../../logger.js';

const log = createChildLogger('tools:registry');

export interface JsonSchemaProperty {
  type: ToolParameter['type'];
  description: string;
  enum?: string[];
}

/** Tool declaration in the shape the Claude Messages API expects. */
export interface AnthropicToolDef {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

function parametersToSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
  const schema: Record<string, JsonSchemaProperty> = {};

  for (const param of params) {
    const paramSchema: JsonSchemaProperty = {
      type: param.type,
      description: param.description,
    };

    if (param.enum) {
      paramSchema.enum = param.enum;
    }

    schema[param.name] = paramSchema;
  }

  return schema;
}

export function toAnthropicTool(tool: ToolSpec): AnthropicToolDef {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: parametersToSchema(tool.parameters),
      required: tool.parameters.filter(p => p.required).map(p => p.name),
    },
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  toAnthropicTools(): AnthropicToolDef[] {
    return this.getAll().map(toAnthropicTool);
  }
}
