export type { ResearchToolContext } from './context.js';
export {
  BraveSearchProvider,
  TavilySearchProvider,
  createSearchProvider,
  type FetchLike,
  type SearchProvider,
} from './search-providers.js';
export {
  MAX_SEARCH_RESULTS,
  webSearch,
  type CitedSearchResult,
  type WebSearchArgs,
  type WebSearchResponse,
} from './web-search.js';
export {
  extractWebpage,
  fetchWebpage,
  type ExtractOptions,
  type FetchWebpageArgs,
  type FetchWebpageResponse,
} from './webpage-fetcher.js';
export {
  RESEARCH_TOOL_NAMES,
  createFetchWebpageTool,
  createResearchTools,
  createWebSearchTool,
  type ResearchToolName,
  type ResearchToolRegistry,
} from './adk-tools.js';
