import { CitationManager } from '../../src/citations/index.js';
import { AppSettingsSchema, type AppSettings } from '../../src/config/index.js';
import type { SearchResult } from '../../src/models/research.js';
import type { ResearchToolContext, SearchProvider } from '../../src/tools/index.js';

export const testSettings = (overrides: Record<string, unknown> = {}): AppSettings =>
  AppSettingsSchema.parse({ search: { tavily_api_key: 'test-secret' }, ...overrides });

export class StaticSearchProvider implements SearchProvider {
  readonly name = 'static';
  readonly calls: Array<{ query: string; maxResults: number }> = [];

  constructor(private readonly results: SearchResult[] | Error) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    this.calls.push({ query, maxResults });
    if (this.results instanceof Error) {
      throw this.results;
    }
    return this.results;
  }
}

export function createTestContext(partial: Partial<ResearchToolContext> = {}): ResearchToolContext {
  return {
    citations: new CitationManager({ now: () => new Date('2024-03-05T10:00:00Z') }),
    settings: testSettings(),
    searchProvider: new StaticSearchProvider([]),
    ...partial,
  };
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}
