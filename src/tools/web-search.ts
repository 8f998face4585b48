/**
 * Web Search Tool
 *
 * Runs a query against the configured search provider and records every
 * result in the run's citation manager, so the agent can cite search hits
 * by number even before reading the pages.
 */
import { InvalidSourceError } from '../errors.js';
import type { SearchResult } from '../models/research.js';
import { toolLogger } from '../utils/logger.js';
import type { ResearchToolContext } from './context.js';

export const MAX_SEARCH_RESULTS = 10;

export type WebSearchArgs = {
  query: string;
  max_results?: number;
};

export type CitedSearchResult = SearchResult & {
  /** Citation index, absent when the result carried no URL */
  citation?: number;
};

export type WebSearchResponse =
  | { success: true; query: string; results: CitedSearchResult[]; count: number }
  | { success: false; error: string; results: CitedSearchResult[] };

export async function webSearch(
  args: WebSearchArgs,
  context: ResearchToolContext
): Promise<WebSearchResponse> {
  const query = args.query?.trim() ?? '';
  if (!query) {
    return { success: false, error: 'Query cannot be empty', results: [] };
  }

  const requested = args.max_results || context.settings.search.max_results;
  const maxResults = Math.min(Math.max(1, Math.trunc(requested)), MAX_SEARCH_RESULTS);

  try {
    toolLogger.info({ query, maxResults, provider: context.searchProvider.name }, 'Executing web search');
    const found = await context.searchProvider.search(query, maxResults);
    const results = found.slice(0, maxResults).map((result) => cite(result, context));

    toolLogger.info({ query, count: results.length }, 'Web search complete');
    return { success: true, query, results, count: results.length };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    toolLogger.error({ query, error: message }, 'Web search failed');
    return { success: false, error: message, results: [] };
  }
}

function cite(result: SearchResult, context: ResearchToolContext): CitedSearchResult {
  if (!result.url.trim()) {
    return result;
  }

  try {
    const citation = context.citations.add({
      url: result.url,
      title: result.title,
      snippet: result.snippet,
    });
    return { ...result, citation };
  } catch (error) {
    if (error instanceof InvalidSourceError) {
      toolLogger.debug({ url: result.url }, 'Skipping search result without usable URL');
      return result;
    }
    throw error;
  }
}
