/**
 * Global Test Setup
 *
 * Silences loggers and console output so test runs only show results.
 */
import { vi } from 'vitest';

process.env['LOG_LEVEL'] = 'silent';

// Suppress console.log in tests unless DEBUG is set
if (!process.env['DEBUG']) {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'debug').mockImplementation(() => {});
}
