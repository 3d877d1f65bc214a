/**
 * Central configuration for exoplanet-archive-mcp
 *
 * Loads environment variables from .env file (if present) and provides
 * typed defaults for all configurable values.
 *
 * Usage:
 *   import { config } from './config.js';
 *   const client = new TapClient({ baseUrl: config.tap.url });
 */
import { config as loadDotenv } from 'dotenv';

// Load .env file (no-op if doesn't exist, quiet suppresses promotional message)
loadDotenv({ quiet: true });

function parseIntEnv(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = Object.freeze({
  // NASA Exoplanet Archive TAP service
  tap: {
    /** Base URL of the TAP service; queries go to `${url}/sync` */
    url: process.env.EXO_TAP_URL ?? 'https://exoplanetarchive.ipac.caltech.edu/TAP',
    /** Upper bound for a single synchronous query */
    timeoutMs: parseIntEnv(process.env.EXO_TAP_TIMEOUT_MS, 60_000),
  },

  /** Prefix error messages with the tool name */
  debug: process.env.EXO_MCP_DEBUG === '1',

  trace: {
    enabled: Boolean(process.env.EXO_TRACE),
    dir: process.env.EXO_TRACE_DIR || undefined,
  },
});

export type Config = typeof config;
