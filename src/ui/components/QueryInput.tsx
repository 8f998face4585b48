import { TextInput } from '@inkjs/ui';
import { Box, Text } from 'ink';
/**
 * Query Input Component
 *
 * Text input for research queries. Clears after submission by cycling the
 * React key. The border turns gray while disabled.
 *
 * Dependencies:
 * - @inkjs/ui: UI component library for Ink (TextInput)
 */
import { useCallback, useState } from 'react';

interface QueryInputProps {
  onSubmit: (value: string) => void;
  isDisabled?: boolean;
  placeholder?: string;
}

export function QueryInput({
  onSubmit,
  isDisabled = false,
  placeholder = 'What would you like to research?',
}: QueryInputProps) {
  const [key, setKey] = useState(0);

  const handleSubmit = useCallback(
    (text: string) => {
      const trimmed = text.trim();
      if (trimmed) {
        onSubmit(trimmed);
        // Force TextInput to reset by changing its key
        setKey((k) => k + 1);
      }
    },
    [onSubmit]
  );

  return (
    <Box borderStyle="round" borderColor={isDisabled ? 'gray' : 'green'} paddingX={1}>
      <Text bold color={isDisabled ? 'gray' : 'green'}>
        {'Research query: '}
      </Text>
      <TextInput key={key} placeholder={placeholder} onSubmit={handleSubmit} isDisabled={isDisabled} />
    </Box>
  );
}
