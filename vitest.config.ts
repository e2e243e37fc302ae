/**
 * @file vitest.config.ts
 * @description Vitest configuration for Terminal Pong unit tests.
 *
 * `environment: 'node'` — the simulation is pure logic and the terminal
 * collaborator is exercised through in-memory fake streams.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig(
{
  test:
  {
    environment: 'node',
    include:     ['tests/**/*.test.ts'],
  },
});
