/**
 * Research Agent
 *
 * Web research specialist that gathers information with web search and page
 * retrieval, then writes a cited summary. Citation numbers come from the
 * tools: every search result and fetched page is recorded in the run's
 * citation manager and returned to the agent with its index.
 *
 * Tools:
 * - web_search: Search provider queries (Tavily or Brave)
 * - fetch_webpage: Fetches and extracts the main text of a URL
 *
 * Dependencies:
 * - @google/adk: LlmAgent for ADK-compatible agent
 */
import { LlmAgent } from '@google/adk';
import type { BaseLlm, BaseTool } from '@google/adk';
import type { ResearchDepth, ResearchQuery } from '../models/research.js';

export const RESEARCH_AGENT_NAME = 'research_agent';

export const DEFAULT_INSTRUCTION = `You are a professional research assistant, an expert in gathering accurate information from the web.

### AVAILABLE TOOLS
- web_search: Web search (returns titles, URLs, snippets and a citation number per result). Use for finding sources.
- fetch_webpage: Fetch the full text of a page (returns its citation number). Use for reading the most promising sources.

### RESEARCH METHODOLOGY

1. **SEARCH BROADLY**
   - Start with web_search using relevant keywords
   - Review the snippets to identify the most promising sources

2. **DIVE DEEP**
   - Use fetch_webpage on the most relevant URLs
   - Extract key facts, data, and insights

3. **VERIFY & SYNTHESIZE**
   - Cross-reference information across multiple sources
   - Present balanced viewpoints when sources disagree

4. **REPORT FINDINGS**
   - Organize findings logically
   - Cite sources inline as [1], [2], etc., using the citation numbers the tools returned

### CONSTRAINTS
- NEVER fabricate information, URLs or citation numbers.
- NEVER present speculation as fact.
- ALWAYS cite sources for factual claims.
- Do NOT write a sources or references section; the bibliography is appended automatically.`;

const DEPTH_GUIDANCE: Record<ResearchDepth, string> = {
  quick: 'Do a quick search and provide a brief summary from 2-3 sources.',
  standard: 'Search multiple sources and provide a comprehensive summary.',
  comprehensive: 'Conduct in-depth research across many sources and provide detailed analysis.',
};

export interface ResearchAgentOptions {
  model: string | BaseLlm;
  tools: BaseTool[];
  /** Replaces the default system instruction. */
  instruction?: string;
  temperature?: number;
}

export function createResearchAgent(options: ResearchAgentOptions): LlmAgent {
  return new LlmAgent({
    name: RESEARCH_AGENT_NAME,
    model: options.model,
    description: 'Web research specialist that produces cited summaries from search results and web pages.',
    instruction: options.instruction ?? DEFAULT_INSTRUCTION,
    tools: options.tools,
    generateContentConfig:
      options.temperature === undefined ? undefined : { temperature: options.temperature },
  });
}

export function buildResearchPrompt(query: ResearchQuery): string {
  return `Research the following topic: ${query.query}

Research depth: ${query.depth}
${DEPTH_GUIDANCE[query.depth]}
Consult at most ${query.maxSources} sources.

Please:
1. Search for relevant information using web_search
2. Read the most relevant sources using fetch_webpage
3. Synthesize the information into a clear, well-organized summary
4. Cite all sources using [1], [2], etc. with the citation numbers from the tools

Begin your research now.`;
}
