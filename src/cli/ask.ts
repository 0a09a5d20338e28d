/**
 * Ask command
 * Pre-flight checks, one conversation, and rendering of the answer or error
 */

import type { AppConfig } from '../env.js';
import { createChildLogger } from '../logger.js';
import { createProvider } from '../providers/index.js';
import { ToolDispatcher } from '../services/dispatcher/index.js';
import { ConversationOrchestrator } from '../services/orchestrator/index.js';
import type { ConversationResult } from '../services/orchestrator/index.js';
import { fetchWebContentSpec, isToolFailure, toAnthropicTool } from '../services/tools/index.js';
import { formatSearchResults } from '../services/web-search.js';
import { AppError, formatErrorLine, toAppError } from '../utils/errors.js';

const log = createChildLogger('cli:ask');

export interface AskIo {
  stdout(line: string): void;
  stderr(line: string): void;
  /** Resolves to '' when input ends before a line is read. */
  prompt(question: string, signal?: AbortSignal): Promise<string>;
}

export interface Assistant {
  converse(query: string, signal?: AbortSignal): Promise<ConversationResult>;
  checkToolService(signal?: AbortSignal): Promise<boolean>;
}

export interface AskOptions {
  query: string[];
  showSources?: boolean;
  signal?: AbortSignal;
  createAssistant?: (config: AppConfig) => Assistant;
}

export function createAssistant(config: AppConfig): Assistant {
  const provider = createProvider(config.claude);
  const dispatcher = new ToolDispatcher(config.toolService);
  const orchestrator = new ConversationOrchestrator(provider, dispatcher, {
    tools: [toAnthropicTool(fetchWebContentSpec)],
  });

  return {
    converse: (query, signal) => orchestrator.converse(query, signal),
    checkToolService: signal => dispatcher.checkHealth(signal),
  };
}

function fail(io: AskIo, error: AppError): number {
  io.stderr(formatErrorLine(error));
  return error.exitCode;
}

/** Runs one query end to end and returns the process exit code. */
export async function runAsk(config: AppConfig, io: AskIo, options: AskOptions): Promise<number> {
  // Checked before anything touches the network
  if (!config.claude.apiKey) {
    return fail(io, AppError.missingCredential('CLAUDE_API_KEY'));
  }

  try {
    let query = options.query.join(' ').trim();
    if (!query) {
      query = (await io.prompt('Ask Claude: ', options.signal)).trim();
    }
    if (!query) {
      return fail(io, AppError.badRequest('A question is required'));
    }

    const assistant = (options.createAssistant ?? createAssistant)(config);

    const toolServiceUp = await assistant.checkToolService(options.signal);
    if (!toolServiceUp) {
      log.warn(
        { toolServer: config.toolService.baseUrl },
        'Tool service is not reachable; answers will not include web results',
      );
    }

    io.stdout(`Searching for ${query}`);

    const result = await assistant.converse(query, options.signal);
    if (result.status === 'failed') {
      return fail(io, result.error);
    }

    io.stdout(`Answer: ${result.answer}`);

    const toolCall = result.toolCall;
    if (options.showSources && toolCall && !isToolFailure(toolCall.result)) {
      const searched = String(toolCall.invocation.parameters.query);
      io.stdout('');
      io.stdout(formatSearchResults(searched, toolCall.result.results));
    }
    return 0;
  } catch (err) {
    return fail(io, toAppError(err));
  }
}
