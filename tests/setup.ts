/**
 * Vitest setup file
 * Runs before all tests
 */

// Required before tsyringe loads
import 'reflect-metadata';

import { afterAll } from 'vitest';
import chalk from 'chalk';
import { teardownTestContainer } from './helpers/test-container.js';

// Assertions compare plain text
chalk.level = 0;

afterAll(() => {
  teardownTestContainer();
});

// NOTE: Do not register process-level signal handlers in tests.
// Vitest owns the process lifecycle; cleanup should happen via test hooks above.
