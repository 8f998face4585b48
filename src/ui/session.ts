/**
 * Interactive Session State
 *
 * Reducer behind the interactive session: ask for a query, ask for a depth,
 * run the research, show the result, repeat until the user quits.
 */
import type { ResearchDepth, ResearchResult } from '../models/research.js';

export const QUIT_COMMANDS = ['quit', 'exit', 'q'];

export interface CompletedResearch {
  query: string;
  depth: ResearchDepth;
  result?: ResearchResult;
  error?: string;
}

export type SessionState =
  | { phase: 'query'; history: CompletedResearch[] }
  | { phase: 'depth'; query: string; history: CompletedResearch[] }
  | { phase: 'running'; query: string; depth: ResearchDepth; history: CompletedResearch[] }
  | { phase: 'exiting'; history: CompletedResearch[] };

export type SessionAction =
  | { type: 'submit_query'; text: string }
  | { type: 'select_depth'; depth: ResearchDepth }
  | { type: 'finished'; result: ResearchResult }
  | { type: 'failed'; message: string }
  | { type: 'quit' };

export const initialSessionState: SessionState = { phase: 'query', history: [] };

export function sessionReducer(state: SessionState, action: SessionAction): SessionState {
  switch (action.type) {
    case 'submit_query': {
      if (state.phase !== 'query') return state;
      const text = action.text.trim();
      if (QUIT_COMMANDS.includes(text.toLowerCase())) {
        return { phase: 'exiting', history: state.history };
      }
      if (!text) return state;
      return { phase: 'depth', query: text, history: state.history };
    }

    case 'select_depth':
      if (state.phase !== 'depth') return state;
      return {
        phase: 'running',
        query: state.query,
        depth: action.depth,
        history: state.history,
      };

    case 'finished':
    case 'failed': {
      if (state.phase !== 'running') return state;
      const entry: CompletedResearch =
        action.type === 'finished'
          ? { query: state.query, depth: state.depth, result: action.result }
          : { query: state.query, depth: state.depth, error: action.message };
      return { phase: 'query', history: [...state.history, entry] };
    }

    case 'quit':
      return { phase: 'exiting', history: state.history };
  }
}

/** One-line description of a tool call for the progress display. */
export function describeToolCall(name: string, args: Record<string, unknown>): string {
  const query = args['query'];
  const url = args['url'];
  if (name === 'web_search' && typeof query === 'string') {
    return `Searching: ${query}`;
  }
  if (name === 'fetch_webpage' && typeof url === 'string') {
    return `Reading: ${url}`;
  }
  return `Running ${name}`;
}
