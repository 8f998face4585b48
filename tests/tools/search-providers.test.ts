import { describe, it, expect, vi } from 'vitest';
import { ConfigError, SearchProviderError } from '../../src/errors.js';
import {
  BraveSearchProvider,
  TavilySearchProvider,
  createSearchProvider,
} from '../../src/tools/index.js';
import { jsonResponse, testSettings } from './helpers.js';

const fakeFetch = (response: Response) =>
  vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);

describe('TavilySearchProvider', () => {
  it('posts the query and maps results', async () => {
    const fetchMock = fakeFetch(
      jsonResponse({
        results: [{ url: 'https://a.example', title: 'A', content: 'About A', score: 0.9 }],
      })
    );
    const provider = new TavilySearchProvider('test-secret', fetchMock);

    const results = await provider.search('solar power', 3);

    expect(results).toEqual([{ url: 'https://a.example', title: 'A', snippet: 'About A', score: 0.9 }]);
    const [input, init] = fetchMock.mock.calls[0];
    expect(input).toBe('https://api.tavily.com/search');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      query: 'solar power',
      max_results: 3,
      search_depth: 'basic',
      include_answer: false,
    });
  });

  it('throws SearchProviderError on a non-2xx status', async () => {
    const provider = new TavilySearchProvider('test-secret', fakeFetch(jsonResponse({}, 401)));

    await expect(provider.search('q', 5)).rejects.toThrow(new SearchProviderError('tavily', 'Search API returned 401'));
  });

  it('throws SearchProviderError on an unexpected body', async () => {
    const provider = new TavilySearchProvider('test-secret', fakeFetch(jsonResponse({ results: 'nope' })));

    await expect(provider.search('q', 5)).rejects.toThrow('tavily: Unexpected response format');
  });
});

describe('BraveSearchProvider', () => {
  it('sends the query string and maps descriptions to snippets', async () => {
    const fetchMock = fakeFetch(
      jsonResponse({ web: { results: [{ url: 'https://b.example', title: 'B', description: 'About B' }] } })
    );
    const provider = new BraveSearchProvider('test-secret', fetchMock);

    const results = await provider.search('wind power', 2);

    expect(results).toEqual([{ url: 'https://b.example', title: 'B', snippet: 'About B' }]);
    const [input, init] = fetchMock.mock.calls[0];
    expect(input).toBe('https://api.search.brave.com/res/v1/web/search?q=wind+power&count=2');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'Accept-Encoding': 'gzip',
      'X-Subscription-Token': 'test-secret',
    });
  });

  it('returns no results when the web section is missing', async () => {
    const provider = new BraveSearchProvider('test-secret', fakeFetch(jsonResponse({})));

    await expect(provider.search('q', 5)).resolves.toEqual([]);
  });
});

describe('createSearchProvider', () => {
  it('builds the configured provider', () => {
    expect(createSearchProvider(testSettings().search).name).toBe('tavily');
    expect(
      createSearchProvider(testSettings({ search: { provider: 'brave', brave_search_api_key: 'test-secret' } }).search)
        .name
    ).toBe('brave');
  });

  it('throws ConfigError when the key is missing', () => {
    expect(() => createSearchProvider(testSettings({ search: { provider: 'brave' } }).search)).toThrow(ConfigError);
  });
});
