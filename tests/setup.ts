/**
 * Vitest setup file
 * Runs before all tests
 */

// tsyringe needs the Reflect metadata polyfill loaded before the container is touched.
import 'reflect-metadata';

import { afterEach } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterEach(() => {
  resetContainer();
});
