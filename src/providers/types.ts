// Provider Interface
// Content blocks are parsed into tagged variants at the provider boundary

import type { AnthropicToolDef } from '../services/tools/index.js';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface UnknownBlock {
  type: 'unknown';
  rawType: string;
}

export type ContentBlock = TextBlock | ToolUseBlock | UnknownBlock;

export type MessageRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: MessageRole;
  readonly content: string | readonly TextBlock[];
}

export interface MessageRequest {
  messages: readonly ConversationTurn[];
  model?: string;
  maxTokens?: number;
  tools?: AnthropicToolDef[];
}

export interface ProviderUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface MessageResponse {
  id: string;
  model: string;
  stopReason: string | null;
  content: ContentBlock[];
  usage: ProviderUsage;
}

export interface LlmProvider {
  name: string;
  sendMessage(request: MessageRequest, signal?: AbortSignal): Promise<MessageResponse>;
}
