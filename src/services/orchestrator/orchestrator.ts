// Conversation Orchestrator
// One model call, at most one tool round-trip, then one forced summary call

import type {
  ContentBlock,
  ConversationTurn,
  LlmProvider,
  MessageRequest,
  ToolUseBlock,
} from '../../providers/index.js';
import { isTextBlock, isToolUseBlock } from '../../providers/index.js';
import { createChildLogger } from '../../logger.js';
import { toAppError } from '../../utils/errors.js';
import type { ToolExecutor } from '../dispatcher/index.js';
import { isToolFailure } from '../tools/index.js';
import type { ToolInvocation, ToolResult } from '../tools/index.js';
import type { ConversationResult, ConversationState, OrchestratorOptions } from './types.js';

const log = createChildLogger('orchestrator');

export const SUMMARY_INSTRUCTION =
  "Please summarize the information from the tool call and don't send any more tool calls";
export const TOOL_SUCCESS_PREFIX =
  '\n\nThe tool call was successful and here is the information from the tool call: ';
export const TOOL_FAILURE_PREFIX = '\n\nThe tool call failed: ';
export const NO_ANSWER = 'No clear answer found';

function userTurn(content: string): ConversationTurn {
  return { role: 'user', content };
}

function assistantTurn(text: string): ConversationTurn {
  return { role: 'assistant', content: [{ type: 'text', text }] };
}

export function findToolUse(content: readonly ContentBlock[]): ToolUseBlock | undefined {
  const toolUses = content.filter(isToolUseBlock);
  if (toolUses.length > 1) {
    log.warn(
      { requested: toolUses.map(t => t.name), honored: toolUses[0].name },
      'Model requested several tools; only the first is run',
    );
  }
  return toolUses[0];
}

/** Text of the first block, when the response opens with text. */
export function leadingText(content: readonly ContentBlock[]): string {
  const first = content[0];
  return first && isTextBlock(first) ? first.text : '';
}

export function extractAnswer(content: readonly ContentBlock[]): string {
  return content.find(isTextBlock)?.text ?? NO_ANSWER;
}

export function toInvocation(block: ToolUseBlock): ToolInvocation {
  // A missing query stays an empty object; the dispatcher rejects it as "no query"
  return {
    name: block.name,
    parameters: { query: block.input.query ?? {} },
  };
}

export function describeToolResult(result: ToolResult): string {
  if (isToolFailure(result)) {
    return TOOL_FAILURE_PREFIX + result.error;
  }
  return TOOL_SUCCESS_PREFIX + (result.results[0]?.description ?? '');
}

export class ConversationOrchestrator {
  constructor(
    private provider: LlmProvider,
    private dispatcher: ToolExecutor,
    private options: OrchestratorOptions,
  ) {}

  async converse(query: string, signal?: AbortSignal): Promise<ConversationResult> {
    const states: ConversationState[] = ['init'];
    const transition = (state: ConversationState) => {
      states.push(state);
      log.debug({ state }, 'Conversation state');
    };

    try {
      transition('awaiting_model');
      const first = await this.provider.sendMessage(
        this.request([userTurn(query)], true),
        signal,
      );

      const toolUse = findToolUse(first.content);
      if (!toolUse) {
        transition('done');
        return { status: 'answered', answer: extractAnswer(first.content), states };
      }

      transition('tool_requested');
      const invocation = toInvocation(toolUse);
      log.info({ tool: invocation.name, query: invocation.parameters.query }, 'Tool call requested');
      const result = await this.dispatcher.dispatch(invocation, signal);

      transition('tool_executed');
      const history: readonly ConversationTurn[] = [
        userTurn(query),
        assistantTurn(leadingText(first.content) + describeToolResult(result)),
      ];

      // No tools on the summary turn: one round-trip per query, whatever the model asks for
      transition('awaiting_summary');
      const summary = await this.provider.sendMessage(
        this.request([...history, userTurn(SUMMARY_INSTRUCTION)], false),
        signal,
      );
      if (summary.content.some(isToolUseBlock)) {
        log.warn('Ignoring tool request in summary response');
      }

      transition('done');
      return {
        status: 'answered',
        answer: extractAnswer(summary.content),
        toolCall: { invocation, result },
        states,
      };
    } catch (err) {
      const error = toAppError(err);
      transition('failed');
      log.error({ code: error.code, err: error }, 'Conversation failed');
      return { status: 'failed', error, states };
    }
  }

  private request(messages: readonly ConversationTurn[], withTools: boolean): MessageRequest {
    return {
      messages,
      model: this.options.model,
      maxTokens: this.options.maxTokens,
      ...(withTools ? { tools: this.options.tools } : {}),
    };
  }
}
