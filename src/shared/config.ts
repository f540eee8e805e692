/**
 * Centralized configuration
 *
 * Reads environment variables with defaults, so the real API, a local mock
 * server or a different discoveries file can be picked without code changes.
 */

/**
 * Numeric env var; keeps an explicit 0 (used for "no rate limit").
 */
function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

const DEFAULT_ENCODING: BufferEncoding = 'utf-8';

export const config = {
  /**
   * Upstream pairing API
   */
  api: {
    // Base URL; the pair route is appended to it (use the mock server URL offline)
    url: process.env.ICRAFT_API_URL || 'https://neal.fun/api/infinite-craft',

    // Requests per rolling minute, 0 = unlimited
    rateLimit: readNumber('ICRAFT_RATE_LIMIT', 400),

    timeout: readNumber('ICRAFT_TIMEOUT', 60000), // 60 seconds
  },

  /**
   * Local discoveries file
   */
  storage: {
    discoveries: process.env.ICRAFT_DISCOVERIES || 'discoveries.json',
    encoding: DEFAULT_ENCODING,
    indent: 2,
  },

  /**
   * Mock API server
   */
  mock: {
    host: process.env.MOCK_HOST || '127.0.0.1',
    port: readNumber('MOCK_PORT', 8080),
    // Optional JSON recipe table loaded at startup
    recipes: process.env.MOCK_RECIPES || null,
  },

  /**
   * Logging
   */
  logging: {
    // Levels: 'debug' | 'info' | 'warn' | 'error'
    level: process.env.LOG_LEVEL || 'info',
    colorize: process.env.NODE_ENV !== 'production',
  },
};

/**
 * Type-safe access to config
 */
export type Config = typeof config;
