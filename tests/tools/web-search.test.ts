import { describe, it, expect } from 'vitest';
import { webSearch } from '../../src/tools/index.js';
import { StaticSearchProvider, createTestContext } from './helpers.js';

const results = [
  { url: 'https://a.example', title: 'A', snippet: 'About A' },
  { url: 'https://b.example', title: 'B', snippet: 'About B' },
  { url: 'https://a.example', title: 'A mirror', snippet: 'Duplicate' },
];

describe('webSearch', () => {
  it('records each result and returns its citation', async () => {
    const context = createTestContext({ searchProvider: new StaticSearchProvider(results) });

    const response = await webSearch({ query: 'energy' }, context);

    expect(response).toEqual({
      success: true,
      query: 'energy',
      count: 3,
      results: [
        { url: 'https://a.example', title: 'A', snippet: 'About A', citation: 1 },
        { url: 'https://b.example', title: 'B', snippet: 'About B', citation: 2 },
        { url: 'https://a.example', title: 'A mirror', snippet: 'Duplicate', citation: 1 },
      ],
    });
    expect(context.citations.size).toBe(2);
    expect(context.citations.get(1).title).toBe('A');
  });

  it('uses the configured result count by default', async () => {
    const provider = new StaticSearchProvider([]);
    const context = createTestContext({ searchProvider: provider });

    await webSearch({ query: 'energy' }, context);

    expect(provider.calls).toEqual([{ query: 'energy', maxResults: 5 }]);
  });

  it('clamps the requested result count to 1..10', async () => {
    const provider = new StaticSearchProvider([]);
    const context = createTestContext({ searchProvider: provider });

    await webSearch({ query: 'a', max_results: 50 }, context);
    await webSearch({ query: 'b', max_results: -3 }, context);

    expect(provider.calls.map((call) => call.maxResults)).toEqual([10, 1]);
  });

  it('only keeps as many results as requested', async () => {
    const context = createTestContext({ searchProvider: new StaticSearchProvider(results) });

    const response = await webSearch({ query: 'energy', max_results: 1 }, context);

    expect(response.results).toHaveLength(1);
    expect(context.citations.size).toBe(1);
  });

  it('returns results without a URL uncited', async () => {
    const context = createTestContext({
      searchProvider: new StaticSearchProvider([{ url: '', title: 'No link', snippet: '' }]),
    });

    const response = await webSearch({ query: 'energy' }, context);

    expect(response.results).toEqual([{ url: '', title: 'No link', snippet: '' }]);
    expect(context.citations.size).toBe(0);
  });

  it('rejects an empty query without searching', async () => {
    const provider = new StaticSearchProvider(results);
    const context = createTestContext({ searchProvider: provider });

    const response = await webSearch({ query: '   ' }, context);

    expect(response).toEqual({ success: false, error: 'Query cannot be empty', results: [] });
    expect(provider.calls).toEqual([]);
  });

  it('reports provider failures', async () => {
    const context = createTestContext({ searchProvider: new StaticSearchProvider(new Error('tavily: Search API returned 500')) });

    const response = await webSearch({ query: 'energy' }, context);

    expect(response).toEqual({ success: false, error: 'tavily: Search API returned 500', results: [] });
    expect(context.citations.size).toBe(0);
  });
});
