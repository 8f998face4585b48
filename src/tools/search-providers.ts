/**
 * Search Providers
 *
 * Web search backends behind one interface. Tavily is the default; Brave
 * Search is available for users who already hold a Brave key. Both are
 * plain REST calls, their JSON responses checked with zod before use.
 */
import { z } from 'zod';
import type { SearchConfig } from '../config/index.js';
import { ConfigError, SearchProviderError } from '../errors.js';
import type { SearchResult } from '../models/research.js';

export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}

export type FetchLike = typeof fetch;

const TAVILY_ENDPOINT = 'https://api.tavily.com/search';
const BRAVE_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string().default(''),
        title: z.string().default(''),
        content: z.string().default(''),
        score: z.number().optional(),
      })
    )
    .default([]),
});

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            url: z.string().default(''),
            title: z.string().default(''),
            description: z.string().default(''),
          })
        )
        .default([]),
    })
    .optional(),
});

export class TavilySearchProvider implements SearchProvider {
  readonly name = 'tavily';

  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const response = await this.fetchImpl(TAVILY_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        query,
        max_results: maxResults,
        search_depth: 'basic',
        include_answer: false,
      }),
    });

    const data = await readJson(this.name, response, TavilyResponseSchema);
    return data.results.map((item) => ({
      url: item.url,
      title: item.title,
      snippet: item.content,
      score: item.score,
    }));
  }
}

export class BraveSearchProvider implements SearchProvider {
  readonly name = 'brave';

  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const url = new URL(BRAVE_ENDPOINT);
    url.searchParams.set('q', query);
    url.searchParams.set('count', String(maxResults));

    const response = await this.fetchImpl(url.toString(), {
      headers: {
        Accept: 'application/json',
        'Accept-Encoding': 'gzip',
        'X-Subscription-Token': this.apiKey,
      },
    });

    const data = await readJson(this.name, response, BraveResponseSchema);
    return (data.web?.results ?? []).map((item) => ({
      url: item.url,
      title: item.title,
      snippet: item.description,
    }));
  }
}

export function createSearchProvider(config: SearchConfig, fetchImpl: FetchLike = fetch): SearchProvider {
  switch (config.provider) {
    case 'tavily':
      if (!config.tavily_api_key) {
        throw new ConfigError('TAVILY_API_KEY environment variable is required');
      }
      return new TavilySearchProvider(config.tavily_api_key, fetchImpl);
    case 'brave':
      if (!config.brave_search_api_key) {
        throw new ConfigError('BRAVE_SEARCH_API_KEY environment variable is required');
      }
      return new BraveSearchProvider(config.brave_search_api_key, fetchImpl);
  }
}

async function readJson<T>(
  provider: string,
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  if (!response.ok) {
    throw new SearchProviderError(provider, `Search API returned ${response.status}`, response.status);
  }

  const result = schema.safeParse(await response.json());
  if (!result.success) {
    throw new SearchProviderError(provider, 'Unexpected response format');
  }
  return result.data;
}
