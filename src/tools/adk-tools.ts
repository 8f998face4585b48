/**
 * ADK FunctionTool Wrappers
 *
 * Wraps the research tool handlers as Google ADK FunctionTools with Zod
 * parameter schemas. The tools are built per run around a
 * ResearchToolContext, and the registry maps each tool name the agent sees
 * to its tool.
 *
 * Tools:
 * - web_search: Web search through the configured provider
 * - fetch_webpage: Fetch and extract the main content of a URL
 */
import { FunctionTool, type BaseTool } from '@google/adk';
import { z } from 'zod';
import type { ResearchToolContext } from './context.js';
import { MAX_SEARCH_RESULTS, webSearch } from './web-search.js';
import { fetchWebpage } from './webpage-fetcher.js';

export const RESEARCH_TOOL_NAMES = ['web_search', 'fetch_webpage'] as const;

export type ResearchToolName = (typeof RESEARCH_TOOL_NAMES)[number];

export type ResearchToolRegistry = Record<ResearchToolName, BaseTool>;

export function createWebSearchTool(context: ResearchToolContext): BaseTool {
  return new FunctionTool({
    name: 'web_search',
    description:
      'Search the web for information on a given query. Returns relevant pages with titles, URLs, ' +
      'snippets and the citation number to use when referring to each result.',
    parameters: z.object({
      query: z.string().describe('The search query to execute'),
      max_results: z
        .number()
        .int()
        .optional()
        .describe(`Maximum number of results to return (1-${MAX_SEARCH_RESULTS})`),
    }),
    execute: async ({ query, max_results }) => webSearch({ query, max_results }, context),
  });
}

export function createFetchWebpageTool(context: ResearchToolContext): BaseTool {
  return new FunctionTool({
    name: 'fetch_webpage',
    description:
      'Fetch a webpage and extract its title and main text content, removing navigation, ' +
      'scripts and other non-content elements. Returns the citation number for the page.',
    parameters: z.object({
      url: z.string().describe('The URL of the webpage to fetch'),
    }),
    execute: async ({ url }) => fetchWebpage({ url }, context),
  });
}

export function createResearchTools(context: ResearchToolContext): ResearchToolRegistry {
  return {
    web_search: createWebSearchTool(context),
    fetch_webpage: createFetchWebpageTool(context),
  };
}
