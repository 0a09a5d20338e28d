import { z } from 'zod';
import type { SearchConfig } from '../env.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('web-search');

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly description: string;
}

export interface SearchGateway {
  search(query: string, limit?: number): Promise<SearchResult[]>;
}

// Instant Answer fields we read; everything else in the payload is ignored
const InstantAnswerSchema = z.object({
  Abstract: z.string().optional(),
  Heading: z.string().optional(),
  AbstractURL: z.string().optional(),
});

type InstantAnswer = z.infer<typeof InstantAnswerSchema>;

function normalizeText(value: unknown): string {
  return String(value ?? '').trim();
}

export function buildSearchUrl(endpoint: string, query: string): string {
  const url = new URL(endpoint);
  url.searchParams.set('q', query);
  url.searchParams.set('format', 'json');
  url.searchParams.set('no_html', '1');
  url.searchParams.set('skip_disambig', '1');
  return url.toString();
}

export function extractAbstractResults(payload: InstantAnswer): SearchResult[] {
  const description = normalizeText(payload.Abstract);
  if (!description) return [];

  return [
    {
      title: normalizeText(payload.Heading),
      url: normalizeText(payload.AbstractURL),
      description,
    },
  ];
}

/**
 * DuckDuckGo Instant Answer gateway.
 *
 * Search absence is never fatal: bad statuses, unreadable bodies and network
 * failures all come back as an empty list. The provider only ever yields its
 * abstract, so `limit` can trim the list but never grow it past one entry.
 */
export class DuckDuckGoSearchGateway implements SearchGateway {
  constructor(
    private config: SearchConfig,
    private fetchImpl: typeof fetch = fetch,
  ) {}

  async search(query: string, limit = 10): Promise<SearchResult[]> {
    const q = normalizeText(query);
    if (!q || limit < 1) return [];

    let response: Response;
    try {
      response = await this.fetchImpl(buildSearchUrl(this.config.endpoint, q), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      log.warn({ query: q, err: error }, 'Search request failed');
      return [];
    }

    if (!response.ok) {
      log.warn({ query: q, status: response.status }, 'Search provider returned an error status');
      return [];
    }

    // The provider labels JSON as application/x-javascript, so parse the text ourselves
    let payload: unknown;
    try {
      payload = JSON.parse(await response.text());
    } catch (error) {
      log.warn({ query: q, err: error }, 'Search provider returned an unreadable body');
      return [];
    }

    const parsed = InstantAnswerSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn({ query: q, issues: parsed.error.issues }, 'Search provider returned an unexpected shape');
      return [];
    }

    const results = extractAbstractResults(parsed.data).slice(0, limit);
    log.debug({ query: q, count: results.length }, 'Search completed');
    return results;
  }
}

export function formatSearchResults(query: string, results: readonly SearchResult[]): string {
  const lines: string[] = [];
  lines.push(`Web search results for query: "${query}"`);

  if (results.length === 0) {
    lines.push('No results.');
    return lines.join('\n');
  }

  results.forEach((result, idx) => {
    lines.push(`${idx + 1}. ${result.title || '(untitled)'}`);
    if (result.url) {
      lines.push(`   URL: ${result.url}`);
    }
    lines.push(`   ${result.description}`);
  });

  return lines.join('\n');
}
