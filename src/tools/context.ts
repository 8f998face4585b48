import type { CitationManager } from '../citations/index.js';
import type { AppSettings } from '../config/index.js';
import type { WebpageContent } from '../models/research.js';
import type { FetchLike, SearchProvider } from './search-providers.js';

/**
 * Everything a research tool needs for one run. Tools are built around a
 * context instead of reaching for module state, so each run records into
 * its own citation manager.
 */
export interface ResearchToolContext {
  citations: CitationManager;
  settings: AppSettings;
  searchProvider: SearchProvider;
  fetchImpl?: FetchLike;
  /** Called after a page was fetched and recorded. */
  onPageFetched?: (page: WebpageContent, citation: number) => void;
}
