// Orchestrator Types

import type { AnthropicToolDef, ToolInvocation, ToolResult } from '../tools/index.js';
import type { AppError } from '../../utils/errors.js';

export type ConversationState =
  | 'init'
  | 'awaiting_model'
  | 'tool_requested'
  | 'tool_executed'
  | 'awaiting_summary'
  | 'done'
  | 'failed';

export interface ToolRoundTrip {
  invocation: ToolInvocation;
  result: ToolResult;
}

export interface ConversationAnswered {
  status: 'answered';
  answer: string;
  toolCall?: ToolRoundTrip;
  states: ConversationState[];
}

export interface ConversationFailed {
  status: 'failed';
  error: AppError;
  states: ConversationState[];
}

export type ConversationResult = ConversationAnswered | ConversationFailed;

export interface OrchestratorOptions {
  tools: AnthropicToolDef[];
  model?: string;
  maxTokens?: number;
}
