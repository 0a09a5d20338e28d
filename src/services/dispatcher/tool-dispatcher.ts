// Tool Dispatcher
// Routes a tool invocation to the tool service with a liveness probe and bounded retry

import { setTimeout as delay } from 'node:timers/promises';
import type { ToolServiceConfig } from '../../env.js';
import { createChildLogger } from '../../logger.js';
import { AppError, ErrorCode, isAbortError, isTransientTransportError } from '../../utils/errors.js';
import { readJson, timeoutSignal, toTransportError } from '../../utils/http.js';
import { ToolResultSchema, toolError } from '../tools/index.js';
import type { ToolInvocation, ToolResult } from '../tools/index.js';

const log = createChildLogger('tools:dispatcher');

export const DISPATCH_ERRORS = {
  NO_TOOL_NAME: 'no tool name',
  NO_QUERY: 'no query',
  SERVICE_NOT_AVAILABLE: 'service not available',
  NOT_RESPONDING: 'service not responding after retries',
  MALFORMED_RESPONSE: 'malformed response from tool service',
} as const;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ToolExecutor {
  dispatch(invocation: ToolInvocation, signal?: AbortSignal): Promise<ToolResult>;
}

export interface ToolDispatcherDeps {
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Client side of the tool service.
 *
 * `dispatch` never throws for tool or transport problems; those come back as
 * `{ error }` results so the conversation can carry on. The one exception is
 * cancellation through `signal`, which rejects with a `cancelled` AppError.
 */
export class ToolDispatcher implements ToolExecutor {
  private fetchImpl: typeof fetch;
  private sleep: Sleep;

  constructor(
    private config: ToolServiceConfig,
    deps: ToolDispatcherDeps = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.config.baseUrl}/health`, {
        method: 'GET',
        signal: timeoutSignal(this.config.healthTimeoutMs, signal),
      });
      // Only the status matters; release the connection
      await response.body?.cancel();
      return response.status === 200;
    } catch (error) {
      if (signal?.aborted) {
        throw AppError.cancelled('Health check cancelled');
      }
      log.warn({ baseUrl: this.config.baseUrl, err: error }, 'Tool service health check failed');
      return false;
    }
  }

  async dispatch(invocation: ToolInvocation, signal?: AbortSignal): Promise<ToolResult> {
    const name = invocation.name.trim();
    if (!name) {
      return toolError(DISPATCH_ERRORS.NO_TOOL_NAME);
    }

    const query = invocation.parameters.query;
    if (typeof query !== 'string' || !query.trim()) {
      return toolError(DISPATCH_ERRORS.NO_QUERY);
    }

    if (!(await this.checkHealth(signal))) {
      return toolError(DISPATCH_ERRORS.SERVICE_NOT_AVAILABLE);
    }

    const { maxAttempts, retryBaseDelayMs } = this.config;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.callTool({ name, parameters: invocation.parameters }, signal);
      } catch (error) {
        if (signal?.aborted || (error instanceof AppError && error.code === ErrorCode.CANCELLED)) {
          throw AppError.cancelled('Tool call cancelled');
        }

        if (!isTransientTransportError(error)) {
          const message = error instanceof Error ? error.message : String(error);
          log.error({ tool: name, err: error }, 'Tool call failed');
          return toolError(`tool call failed: ${message}`);
        }

        log.warn(
          { tool: name, attempt, maxAttempts, err: error },
          'Tool service not responding, retrying',
        );

        if (attempt < maxAttempts) {
          await this.backoff(attempt, retryBaseDelayMs, signal);
        }
      }
    }

    return toolError(DISPATCH_ERRORS.NOT_RESPONDING);
  }

  // Any HTTP response is final; only failures to get one are thrown
  private async callTool(invocation: ToolInvocation, signal?: AbortSignal): Promise<ToolResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}/tool_call`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(invocation),
        signal: timeoutSignal(this.config.callTimeoutMs, signal),
      });
    } catch (error) {
      throw toTransportError(error, 'Tool service', signal);
    }

    let payload: unknown;
    try {
      payload = await readJson(response, 'Tool service');
    } catch (error) {
      // Losing the connection mid-body is a transport failure, bad JSON is not
      if (!(error instanceof AppError)) throw toTransportError(error, 'Tool service', signal);
      log.warn({ status: response.status, err: error }, 'Tool service returned an unreadable body');
      return toolError(DISPATCH_ERRORS.MALFORMED_RESPONSE);
    }

    const parsed = ToolResultSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn({ status: response.status, issues: parsed.error.issues }, 'Tool service returned an unexpected shape');
      return toolError(DISPATCH_ERRORS.MALFORMED_RESPONSE);
    }

    return parsed.data;
  }

  private async backoff(attempt: number, baseDelayMs: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(computeBackoffMs(attempt, baseDelayMs), signal);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw AppError.cancelled('Tool call cancelled');
      }
      throw error;
    }
  }
}
