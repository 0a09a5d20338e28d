import { describe, it, expect, vi } from 'vitest';
import { createFetchWebContentTool } from '../fetch-web-content-tool.js';
import { initializeTools } from '../index.js';
import type { SearchGateway, SearchResult } from '../../web-search.js';

const eiffel: SearchResult = {
  title: 'Eiffel Tower',
  url: 'https://example.com/eiffel',
  description: 'The tower is 330 metres tall.',
};

function createGateway(results: SearchResult[] = [eiffel]) {
  return { search: vi.fn<SearchGateway['search']>(async () => results) };
}

describe('fetch_web_content tool', () => {
  it('returns the gateway results for a query', async () => {
    const gateway = createGateway();
    const tool = createFetchWebContentTool(gateway);

    const result = await tool.execute({ query: '  Eiffel Tower height ' });

    expect(result).toEqual({ results: [eiffel] });
    expect(gateway.search).toHaveBeenCalledWith('Eiffel Tower height');
  });

  it('returns an empty result list when the gateway finds nothing', async () => {
    const tool = createFetchWebContentTool(createGateway([]));

    expect(await tool.execute({ query: 'obscure topic' })).toEqual({ results: [] });
  });

  it('rejects a missing, blank or non-string query without searching', async () => {
    const gateway = createGateway();
    const tool = createFetchWebContentTool(gateway);

    expect(await tool.execute({})).toEqual({ error: 'no query' });
    expect(await tool.execute({ query: '   ' })).toEqual({ error: 'no query' });
    expect(await tool.execute({ query: {} })).toEqual({ error: 'no query' });
    expect(gateway.search).not.toHaveBeenCalled();
  });

  it('initializeTools registers the tool under its declared name', () => {
    const registry = initializeTools(createGateway());

    expect(registry.getAll().map(t => t.name)).toEqual(['fetch_web_content']);
  });
});
