/**
 * Research Models
 *
 * Shapes passed between the CLI, the orchestrator and the tools. The query
 * is validated with zod because it arrives from user input; the rest are
 * produced by our own code.
 */
import { z } from 'zod';
import type { CitationEntry } from '../citations/index.js';

export const RESEARCH_DEPTHS = ['quick', 'standard', 'comprehensive'] as const;

export type ResearchDepth = (typeof RESEARCH_DEPTHS)[number];

export const ResearchQuerySchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty'),
  depth: z.enum(RESEARCH_DEPTHS).default('standard'),
  maxSources: z.number().int().min(1).max(20).default(5),
});

export type ResearchQuery = z.infer<typeof ResearchQuerySchema>;
export type ResearchQueryInput = z.input<typeof ResearchQuerySchema>;

export function isResearchDepth(value: string): value is ResearchDepth {
  return RESEARCH_DEPTHS.some((depth) => depth === value);
}

export type SearchResult = {
  url: string;
  title: string;
  snippet: string;
  score?: number;
};

export type WebpageContent = {
  url: string;
  title: string;
  content: string;
  author?: string;
  publishedDate?: string;
  extractedAt: Date;
};

export interface ResearchResult {
  query: string;
  depth: ResearchDepth;
  /** The agent's own write-up, without the bibliography. */
  findings: string;
  bibliography: string[];
  /** Findings followed by the rendered bibliography. */
  summary: string;
  citations: CitationEntry[];
  /** URLs whose pages were fetched successfully. */
  sourcesConsulted: string[];
  /** Model turns that requested tool calls. */
  iterations: number;
  /** False when the run hit the iteration limit before a final answer. */
  completed: boolean;
  timestamp: Date;
}
