/**
 * Environment Configuration
 *
 * Loads environment variables from .env file.
 * Must be imported before any other modules that need env vars.
 */

import dotenv from 'dotenv';
import { ENV_FILE } from './paths.js';

// Load .env file
dotenv.config({ path: ENV_FILE });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// Export typed environment access
export const env = {
  get CHROME_PATH(): string | undefined {
    return nonEmpty(process.env.CHROME_PATH);
  },
  get WAYBACK_ENDPOINT(): string | undefined {
    return nonEmpty(process.env.WAYBACK_ENDPOINT);
  },
  get CAPTURE_LOG_FILE(): string | undefined {
    return nonEmpty(process.env.CAPTURE_LOG_FILE);
  },
  get LOG_LEVEL(): LogLevel {
    const level = process.env.LOG_LEVEL?.toLowerCase();
    return LOG_LEVELS.find((candidate) => candidate === level) ?? 'warn';
  },
};
