/**
 * Shared Vitest setup for marquee
 *
 * Pipeline stages log every degraded path at warn. Tests exercise those
 * paths on purpose, so logging is limited to errors unless
 * MARQUEE_LOG_LEVEL asks for more.
 */

import { afterEach, vi } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

if (!process.env.MARQUEE_LOG_LEVEL) {
  setLogLevel('error');
}

afterEach(() => {
  vi.useRealTimers();
});
