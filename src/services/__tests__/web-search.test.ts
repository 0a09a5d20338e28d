import { describe, it, expect, vi } from 'vitest';
import {
  DuckDuckGoSearchGateway,
  buildSearchUrl,
  formatSearchResults,
} from '../web-search.js';

const config = { endpoint: 'https://search.test', timeoutMs: 8000 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/x-javascript' },
  });
}

function createGateway(impl: () => Promise<Response>) {
  const fetchImpl = vi.fn<typeof fetch>(impl);
  return { gateway: new DuckDuckGoSearchGateway(config, fetchImpl), fetchImpl };
}

describe('Search Gateway', () => {
  it('builds the request with fixed formatting options', () => {
    expect(buildSearchUrl('https://api.duckduckgo.com', 'Eiffel Tower')).toBe(
      'https://api.duckduckgo.com/?q=Eiffel+Tower&format=json&no_html=1&skip_disambig=1',
    );
  });

  it('returns the abstract as a single result', async () => {
    const { gateway, fetchImpl } = createGateway(async () =>
      jsonResponse({
        Heading: 'Eiffel Tower',
        AbstractURL: 'https://example.com/eiffel',
        Abstract: 'The tower is 330 metres tall.',
        RelatedTopics: [{ Text: 'ignored' }],
      }),
    );

    const results = await gateway.search('Eiffel Tower height');

    expect(results).toEqual([
      {
        title: 'Eiffel Tower',
        url: 'https://example.com/eiffel',
        description: 'The tower is 330 metres tall.',
      },
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(String(fetchImpl.mock.calls[0][0])).toBe(
      'https://search.test/?q=Eiffel+Tower+height&format=json&no_html=1&skip_disambig=1',
    );
  });

  it('returns no results when the provider has no abstract', async () => {
    const { gateway } = createGateway(async () =>
      jsonResponse({ Heading: 'Something', Abstract: '', AbstractURL: '' }),
    );

    expect(await gateway.search('something')).toEqual([]);
  });

  it('returns no results on an error status', async () => {
    const { gateway } = createGateway(async () => jsonResponse({ message: 'busy' }, 503));

    expect(await gateway.search('anything')).toEqual([]);
  });

  it('returns no results when the body is not JSON', async () => {
    const { gateway } = createGateway(async () => new Response('<html>oops</html>', { status: 200 }));

    expect(await gateway.search('anything')).toEqual([]);
  });

  it('returns no results when the body has the wrong shape', async () => {
    const { gateway } = createGateway(async () => jsonResponse({ Abstract: 42 }));

    expect(await gateway.search('anything')).toEqual([]);
  });

  it('returns no results when the request itself fails', async () => {
    const { gateway } = createGateway(async () => {
      throw new TypeError('fetch failed');
    });

    expect(await gateway.search('anything')).toEqual([]);
  });

  it('skips the request for a blank query or a zero limit', async () => {
    const { gateway, fetchImpl } = createGateway(async () => jsonResponse({}));

    expect(await gateway.search('   ')).toEqual([]);
    expect(await gateway.search('Eiffel Tower', 0)).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('formats results for display', () => {
    const text = formatSearchResults('Eiffel Tower height', [
      {
        title: 'Eiffel Tower',
        url: 'https://example.com/eiffel',
        description: 'The tower is 330 metres tall.',
      },
    ]);

    expect(text).toBe(
      [
        'Web search results for query: "Eiffel Tower height"',
        '1. Eiffel Tower',
        '   URL: https://example.com/eiffel',
        '   The tower is 330 metres tall.',
      ].join('\n'),
    );
    expect(formatSearchResults('nothing', [])).toBe(
      'Web search results for query: "nothing"\nNo results.',
    );
  });
});
