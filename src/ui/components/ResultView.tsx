/**
 * Result View Component
 *
 * Shows a finished research run: the summary rendered as terminal markdown,
 * a warning when the run stopped at the iteration limit, and a one-line
 * tally of sources. Failed runs show the error instead.
 */
import { Box, Text } from 'ink';
import { useMemo } from 'react';
import type { ResearchResult } from '../../models/research.js';
import { renderMarkdown } from '../../report/markdown.js';

function Markdown({ children }: { children: string }) {
  const rendered = useMemo(() => renderMarkdown(children), [children]);
  return <Text>{rendered}</Text>;
}

interface ResultViewProps {
  result?: ResearchResult;
  error?: string;
}

export function ResultView({ result, error }: ResultViewProps) {
  if (error !== undefined || !result) {
    return (
      <Box paddingY={1}>
        <Text>
          <Text bold color="red">
            Error:
          </Text>{' '}
          {error ?? 'Research produced no result'}
        </Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" paddingY={1}>
      <Markdown>{result.summary}</Markdown>
      {!result.completed && <Text color="yellow">Stopped at the iteration limit; findings may be partial.</Text>}
      <Text dimColor>
        {result.citations.length} cited, {result.sourcesConsulted.length} read, {result.iterations} tool turns
      </Text>
    </Box>
  );
}
