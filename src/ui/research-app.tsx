/**
 * Single Research App
 *
 * Rendered by `research-assistant research`: shows the query header, runs
 * the research once with a spinner, then prints the result and exits.
 */
import { useEffect, useState } from 'react';
import { Box, useApp } from 'ink';
import { Header, ResearchRun, ResultView, type Researcher, type ResearchOutcome } from './components/index.js';
import type { ResearchQuery } from '../models/research.js';

interface ResearchCommandAppProps {
  researcher: Researcher;
  query: ResearchQuery;
  onOutcome?: (outcome: ResearchOutcome) => void;
}

export function ResearchCommandApp({ researcher, query, onOutcome }: ResearchCommandAppProps) {
  const { exit } = useApp();
  const [outcome, setOutcome] = useState<ResearchOutcome | null>(null);

  useEffect(() => {
    if (outcome) {
      onOutcome?.(outcome);
      exit();
    }
  }, [outcome]);

  return (
    <Box flexDirection="column">
      <Header query={query.query} depth={query.depth} maxSources={query.maxSources} />
      {outcome === null ? (
        <ResearchRun researcher={researcher} query={query} onFinish={setOutcome} />
      ) : outcome.ok ? (
        <ResultView result={outcome.result} />
      ) : (
        <ResultView error={outcome.error.message} />
      )}
    </Box>
  );
}
