import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { buildToolServer } from '../../app.js';
import { initializeTools } from '../../services/tools/index.js';
import type { SearchGateway, SearchResult } from '../../services/web-search.js';

const eiffel: SearchResult = {
  title: 'Eiffel Tower',
  url: 'https://example.com/eiffel',
  description: 'The tower is 330 metres tall.',
};

describe.sequential('Tool Service Routes', () => {
  const gateway = { search: vi.fn<SearchGateway['search']>() };
  const app = buildToolServer({ registry: initializeTools(gateway) });

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    gateway.search.mockReset();
  });

  it('GET /health reports ok and the registered tools', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.status).toBe('ok');
    expect(body.tools).toEqual(['fetch_web_content']);
  });

  it('POST /tool_call runs the tool and returns its results', async () => {
    gateway.search.mockResolvedValue([eiffel]);

    const response = await app.inject({
      method: 'POST',
      url: '/tool_call',
      payload: { name: 'fetch_web_content', parameters: { query: 'Eiffel Tower height' } },
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ results: [eiffel] });
    expect(gateway.search).toHaveBeenCalledWith('Eiffel Tower height');
  });

  it('POST /tool_call returns the tool error for an empty query', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/tool_call',
      payload: { name: 'fetch_web_content', parameters: { query: '' } },
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ error: 'no query' });
    expect(gateway.search).not.toHaveBeenCalled();
  });

  it('POST /tool_call defaults missing parameters to an empty object', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/tool_call',
      payload: { name: 'fetch_web_content' },
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ error: 'no query' });
  });

  it('returns 404 for an unknown tool', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/tool_call',
      payload: { name: 'calculator', parameters: { expression: '2+2' } },
    });

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body)).toEqual({
      error: 'unknown tool "calculator"',
      code: 'not_found',
    });
  });

  it('returns 400 when the body has no tool name', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/tool_call',
      payload: { parameters: { query: 'Eiffel Tower height' } },
    });

    expect(response.statusCode).toBe(400);
    const body = JSON.parse(response.body);
    expect(body.code).toBe('bad_request');
    expect(body.error).toBe('name: Required');
  });

  it('returns 500 when the tool throws', async () => {
    gateway.search.mockRejectedValue(new Error('search exploded'));

    const response = await app.inject({
      method: 'POST',
      url: '/tool_call',
      payload: { name: 'fetch_web_content', parameters: { query: 'Eiffel Tower height' } },
    });

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({
      error: 'Error: search exploded',
      code: 'provider_error',
    });
  });
});
