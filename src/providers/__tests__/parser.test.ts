import { describe, it, expect } from 'vitest';
import { parseMessageResponse } from '../parser.js';
import { AppError } from '../../utils/errors.js';

describe('parseMessageResponse', () => {
  it('parses text and tool_use blocks into tagged variants', () => {
    const response = parseMessageResponse({
      id: 'msg_1',
      model: 'claude-test',
      stop_reason: 'tool_use',
      content: [
        { type: 'text', text: 'Let me look that up.' },
        {
          type: 'tool_use',
          id: 'toolu_1',
          name: 'fetch_web_content',
          input: { query: 'Eiffel Tower height' },
        },
      ],
      usage: { input_tokens: 12, output_tokens: 34 },
    });

    expect(response).toEqual({
      id: 'msg_1',
      model: 'claude-test',
      stopReason: 'tool_use',
      content: [
        { type: 'text', text: 'Let me look that up.' },
        {
          type: 'tool_use',
          id: 'toolu_1',
          name: 'fetch_web_content',
          input: { query: 'Eiffel Tower height' },
        },
      ],
      usage: { inputTokens: 12, outputTokens: 34 },
    });
  });

  it('maps unfamiliar block types to unknown blocks', () => {
    const response = parseMessageResponse({
      content: [{ type: 'thinking', thinking: 'hmm' }, { type: 'text', text: 'Done.' }],
    });

    expect(response.content).toEqual([
      { type: 'unknown', rawType: 'thinking' },
      { type: 'text', text: 'Done.' },
    ]);
    expect(response.stopReason).toBeNull();
    expect(response.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it('defaults a missing tool input to an empty object', () => {
    const response = parseMessageResponse({
      content: [{ type: 'tool_use', id: 'toolu_2', name: 'fetch_web_content' }],
    });

    expect(response.content).toEqual([
      { type: 'tool_use', id: 'toolu_2', name: 'fetch_web_content', input: {} },
    ]);
  });

  it('keeps a tool_use block whose input is not an object, with empty input', () => {
    const response = parseMessageResponse({
      content: [{ type: 'tool_use', id: 'toolu_3', name: 'fetch_web_content', input: 'Eiffel Tower' }],
    });

    expect(response.content).toEqual([
      { type: 'tool_use', id: 'toolu_3', name: 'fetch_web_content', input: {} },
    ]);
  });

  it('keeps a tool_use block without a name, with an empty name', () => {
    const response = parseMessageResponse({
      content: [{ type: 'tool_use', id: 'toolu_4', input: { query: 'Eiffel Tower' } }],
    });

    expect(response.content).toEqual([
      { type: 'tool_use', id: 'toolu_4', name: '', input: { query: 'Eiffel Tower' } },
    ]);
  });

  it('treats a text block without text as unknown', () => {
    const response = parseMessageResponse({ content: [{ type: 'text' }] });

    expect(response.content).toEqual([{ type: 'unknown', rawType: 'text' }]);
  });

  it('throws a malformed_response error when content is missing', () => {
    expect(() => parseMessageResponse({ type: 'error' })).toThrow(AppError);

    try {
      parseMessageResponse({ content: 'not an array' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'malformed_response' });
    }
  });
});
