import { Box, Text } from 'ink';

interface HeaderProps {
  query: string;
  depth: string;
  maxSources?: number;
  title?: string;
}

export function Header({ query, depth, maxSources, title = 'Research Assistant' }: HeaderProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2} alignSelf="flex-start">
      <Text bold color="cyan">
        {title}
      </Text>
      <Text>
        <Text bold color="cyan">
          Research Query:
        </Text>{' '}
        {query}
      </Text>
      <Text>
        <Text bold color="cyan">
          Depth:
        </Text>{' '}
        {depth}
      </Text>
      {maxSources !== undefined && (
        <Text>
          <Text bold color="cyan">
            Max Sources:
          </Text>{' '}
          {maxSources}
        </Text>
      )}
    </Box>
  );
}
