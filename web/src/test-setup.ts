/**
 * Test setup: jsdom environment for component and hook tests
 */

import { afterEach } from 'vitest';
import { cleanup } from '@testing-library/react';
import { MotionGlobalConfig } from 'framer-motion';

// Animations complete on the next frame instead of running in real time
MotionGlobalConfig.skipAnimations = true;

afterEach(() => {
  cleanup();
});
