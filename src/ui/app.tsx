/**
 * Interactive Session App
 *
 * Root component for `research-assistant interactive`. Loops through query
 * entry, depth selection and a research run, keeping earlier results on
 * screen until the user types quit, exit or q.
 *
 * Dependencies:
 * - ink: React-based terminal UI framework
 *   - Box: Flexbox layout container
 *   - useApp: Application lifecycle hooks
 */
import { useCallback, useEffect, useReducer } from 'react';
import { Box, Text, useApp } from 'ink';
import {
  DepthSelect,
  QueryInput,
  ResearchRun,
  ResultView,
  type Researcher,
  type ResearchOutcome,
} from './components/index.js';
import { initialSessionState, sessionReducer } from './session.js';
import { uiLogger } from '../utils/logger.js';

interface InteractiveAppProps {
  researcher: Researcher;
}

export function InteractiveApp({ researcher }: InteractiveAppProps) {
  const { exit } = useApp();
  const [state, dispatch] = useReducer(sessionReducer, initialSessionState);

  useEffect(() => {
    if (state.phase === 'exiting') {
      uiLogger.info({ runs: state.history.length }, 'Interactive session ended');
      exit();
    }
  }, [state, exit]);

  const handleFinish = useCallback((outcome: ResearchOutcome) => {
    if (outcome.ok) {
      dispatch({ type: 'finished', result: outcome.result });
    } else {
      dispatch({ type: 'failed', message: outcome.error.message });
    }
  }, []);

  return (
    <Box flexDirection="column">
      <Text bold color="cyan">
        Research Assistant - Interactive Mode
      </Text>
      <Text dimColor>Type 'quit', 'exit' or 'q' to leave.</Text>

      {state.history.map((entry, i) => (
        <Box key={i} flexDirection="column" marginTop={1}>
          <Text>
            <Text bold color="cyan">
              {entry.query}
            </Text>
            <Text dimColor> ({entry.depth})</Text>
          </Text>
          <ResultView result={entry.result} error={entry.error} />
        </Box>
      ))}

      {state.phase === 'query' && (
        <QueryInput onSubmit={(text) => dispatch({ type: 'submit_query', text })} />
      )}
      {state.phase === 'depth' && (
        <DepthSelect query={state.query} onSelect={(depth) => dispatch({ type: 'select_depth', depth })} />
      )}
      {state.phase === 'running' && (
        <ResearchRun
          key={state.history.length}
          researcher={researcher}
          query={{ query: state.query, depth: state.depth }}
          onFinish={handleFinish}
        />
      )}
      {state.phase === 'exiting' && <Text>Goodbye!</Text>}
    </Box>
  );
}
