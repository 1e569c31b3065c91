import React from 'react';
import { Box, Text } from 'ink';
import { Banner } from './Banner.js';

interface UsageErrorProps {
  message: string;
}

export const UsageError: React.FC<UsageErrorProps> = ({ message }) => (
  <Box flexDirection="column">
    <Banner />
    <Text color="red">❌ {message}</Text>
  </Box>
);
