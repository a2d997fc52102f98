import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

// An unknown HARNESS_LOG_LEVEL falls back to info here; loadConfig() rejects it as INVALID_CONFIG.
function initialLevel(): string {
  const level = process.env['HARNESS_LOG_LEVEL'];
  if (level && (level === 'silent' || level in pino.levels.values)) return level;
  return 'info';
}

// Always stderr: stdout belongs to the test runner.
export const logger: Logger = pino(
  {
    name: 'sandbox-harness',
    level: initialLevel(),
  },
  pino.destination(2)
);
