// Orchestrator Module - Main exports

export {
  ConversationOrchestrator,
  SUMMARY_INSTRUCTION,
  NO_ANSWER,
  TOOL_SUCCESS_PREFIX,
  TOOL_FAILURE_PREFIX,
  describeToolResult,
  extractAnswer,
  findToolUse,
  leadingText,
  toInvocation,
} from './orchestrator.js';
export type {
  ConversationResult,
  ConversationAnswered,
  ConversationFailed,
  ConversationState,
  OrchestratorOptions,
  ToolRoundTrip,
} from './types.js';
