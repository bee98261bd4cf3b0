/**
 * Vitest setup file
 * Runs before every test file
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { afterEach } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterEach(() => {
  resetContainer();
});
