import { describe, it, expect } from 'vitest';
import type { ResearchResult } from '../../../src/models/research.js';
import {
  describeToolCall,
  initialSessionState,
  sessionReducer,
  type SessionState,
} from '../../../src/ui/session.js';

const result: ResearchResult = {
  query: 'ocean tides',
  depth: 'quick',
  findings: 'Done.',
  bibliography: [],
  summary: 'Done.',
  citations: [],
  sourcesConsulted: [],
  iterations: 0,
  completed: true,
  timestamp: new Date('2024-03-05T10:00:00Z'),
};

describe('sessionReducer', () => {
  it('moves from query to depth selection', () => {
    const state = sessionReducer(initialSessionState, { type: 'submit_query', text: '  ocean tides ' });

    expect(state).toEqual({ phase: 'depth', query: 'ocean tides', history: [] });
  });

  it('ignores an empty query', () => {
    expect(sessionReducer(initialSessionState, { type: 'submit_query', text: '  ' })).toBe(initialSessionState);
  });

  it.each(['quit', 'exit', 'q', 'QUIT'])('exits on %s', (text) => {
    expect(sessionReducer(initialSessionState, { type: 'submit_query', text }).phase).toBe('exiting');
  });

  it('starts a run once a depth is selected', () => {
    const depth: SessionState = { phase: 'depth', query: 'ocean tides', history: [] };

    expect(sessionReducer(depth, { type: 'select_depth', depth: 'comprehensive' })).toEqual({
      phase: 'running',
      query: 'ocean tides',
      depth: 'comprehensive',
      history: [],
    });
  });

  it('records finished and failed runs and asks for the next query', () => {
    const running: SessionState = { phase: 'running', query: 'ocean tides', depth: 'quick', history: [] };

    const afterSuccess = sessionReducer(running, { type: 'finished', result });
    expect(afterSuccess).toEqual({
      phase: 'query',
      history: [{ query: 'ocean tides', depth: 'quick', result }],
    });

    const runningAgain: SessionState = { ...running, history: afterSuccess.history };
    const afterFailure = sessionReducer(runningAgain, { type: 'failed', message: 'tavily: Search API returned 500' });
    expect(afterFailure.history).toEqual([
      { query: 'ocean tides', depth: 'quick', result },
      { query: 'ocean tides', depth: 'quick', error: 'tavily: Search API returned 500' },
    ]);
  });

  it('ignores actions that do not fit the current phase', () => {
    expect(sessionReducer(initialSessionState, { type: 'select_depth', depth: 'quick' })).toBe(initialSessionState);
    expect(sessionReducer(initialSessionState, { type: 'finished', result })).toBe(initialSessionState);
  });

  it('quits from any phase', () => {
    const running: SessionState = { phase: 'running', query: 'q', depth: 'quick', history: [] };

    expect(sessionReducer(running, { type: 'quit' })).toEqual({ phase: 'exiting', history: [] });
  });
});

describe('describeToolCall', () => {
  it('describes searches and page reads', () => {
    expect(describeToolCall('web_search', { query: 'ocean tides' })).toBe('Searching: ocean tides');
    expect(describeToolCall('fetch_webpage', { url: 'https://a.example' })).toBe('Reading: https://a.example');
    expect(describeToolCall('other_tool', {})).toBe('Running other_tool');
  });
});
