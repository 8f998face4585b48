import { Select } from '@inkjs/ui';
import { Box, Text } from 'ink';
import { isResearchDepth, type ResearchDepth } from '../../models/research.js';

const DEPTH_OPTIONS: Array<{ label: string; value: ResearchDepth }> = [
  { label: 'standard: multiple sources, comprehensive summary', value: 'standard' },
  { label: 'quick: brief summary from 2-3 sources', value: 'quick' },
  { label: 'comprehensive: in-depth analysis across many sources', value: 'comprehensive' },
];

interface DepthSelectProps {
  query: string;
  onSelect: (depth: ResearchDepth) => void;
}

export function DepthSelect({ query, onSelect }: DepthSelectProps) {
  return (
    <Box flexDirection="column">
      <Text>
        <Text dimColor>Research depth for </Text>
        <Text bold>{query}</Text>
      </Text>
      <Select
        options={DEPTH_OPTIONS}
        onChange={(value) => {
          if (isResearchDepth(value)) {
            onSelect(value);
          }
        }}
      />
    </Box>
  );
}
