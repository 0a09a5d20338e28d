// Anthropic Provider
// Claude Messages API over plain fetch

import type { ClaudeConfig } from '../env.js';
import { AppError } from '../utils/errors.js';
import { readJson, timeoutSignal, toTransportError } from '../utils/http.js';
import { parseMessageResponse } from './parser.js';
import type { LlmProvider, MessageRequest, MessageResponse } from './types.js';

export class AnthropicProvider implements LlmProvider {
  name = 'anthropic';
  private fetchImpl: typeof fetch;

  constructor(
    private config: ClaudeConfig,
    fetchImpl: typeof fetch = fetch,
  ) {
    if (!config.apiKey) {
      throw AppError.missingCredential('CLAUDE_API_KEY');
    }
    this.fetchImpl = fetchImpl;
  }

  async sendMessage(request: MessageRequest, signal?: AbortSignal): Promise<MessageResponse> {
    const body = {
      model: request.model ?? this.config.model,
      max_tokens: request.maxTokens ?? this.config.maxTokens,
      messages: request.messages,
      ...(request.tools && request.tools.length > 0 ? { tools: request.tools } : {}),
    };

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.apiUrl, {
        method: 'POST',
        headers: {
          'x-api-key': this.config.apiKey,
          'anthropic-version': this.config.apiVersion,
          'content-type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: timeoutSignal(this.config.timeoutMs, signal),
      });
    } catch (error) {
      throw toTransportError(error, 'Claude API', signal);
    }

    if (!response.ok) {
      const error = await response.text();
      throw AppError.providerError(`Claude API error (${response.status}): ${error}`, {
        status: response.status,
      });
    }

    return parseMessageResponse(await readJson(response, 'Claude API'));
  }
}
