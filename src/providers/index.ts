// Provider Registry

import type { ClaudeConfig } from '../env.js';
import { AnthropicProvider } from './anthropic.js';
import type { LlmProvider } from './types.js';

export function createProvider(config: ClaudeConfig, fetchImpl?: typeof fetch): LlmProvider {
  return new AnthropicProvider(config, fetchImpl);
}

export { AnthropicProvider } from './anthropic.js';
export { parseMessageResponse, isTextBlock, isToolUseBlock } from './parser.js';
export type {
  LlmProvider,
  ContentBlock,
  ConversationTurn,
  MessageRequest,
  MessageResponse,
  TextBlock,
  ToolUseBlock,
  UnknownBlock,
} from './types.js';
