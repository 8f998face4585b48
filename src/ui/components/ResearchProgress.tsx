import { Spinner } from '@inkjs/ui';
import { Box, Text } from 'ink';
/**
 * Research Progress Component
 *
 * Spinner shown while a research run is in flight, with the latest tool
 * activity (the current search or page) underneath.
 */
import { useEffect, useState } from 'react';

interface ResearchProgressProps {
  message?: string;
  activity?: string | null;
}

export function ResearchProgress({ message = 'Researching...', activity }: ResearchProgressProps) {
  // Delay spinner animation to avoid Ink rendering race condition
  const [showSpinner, setShowSpinner] = useState(false);

  useEffect(() => {
    const timer = setTimeout(() => setShowSpinner(true), 50);
    return () => clearTimeout(timer);
  }, []);

  return (
    <Box flexDirection="column" paddingY={1}>
      {showSpinner ? <Spinner label={message} /> : <Text>{message}</Text>}
      {activity && <Text dimColor>{activity}</Text>}
    </Box>
  );
}
