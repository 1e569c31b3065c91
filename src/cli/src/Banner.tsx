/**
 * Banner Component
 * Title shown at the top of every mcasm screen
 */

import React from 'react';
import { Text } from 'ink';

export const BANNER_TITLE = 'Microcode Assembler';

export const Banner: React.FC = () => <Text bold>{BANNER_TITLE}</Text>;
