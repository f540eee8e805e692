/**
 * Library-wide constants
 */

import type { DiscoveryRecord, PairResponseBody } from './types';

/**
 * Pairing API routes, relative to the configured API URL
 */
export const API_ROUTES = {
  PAIR: '/pair',
} as const;

/**
 * Answer the API gives when two elements do not combine
 */
export const NOTHING_RESULT: PairResponseBody = {
  result: 'Nothing',
  emoji: '',
  isNew: false,
};

/**
 * Pair used by ping()
 */
export const PING_PAIR = {
  first: 'Fire',
  second: 'Water',
} as const;

/** Trailing window of the rate limiter */
export const RATE_LIMIT_WINDOW_MS = 60_000;

/**
 * Headers a browser would send; the API rejects bare clients.
 * User-supplied headers are merged over these.
 */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'accept': '*/*',
  'accept-language': 'en-US,en;q=0.9',
  'priority': 'u=1, i',
  'cache-control': 'no-cache',
  'pragma': 'no-cache',
  'sec-ch-ua': '"Not A(Brand";v="99", "Google Chrome";v="121", "Chromium";v="121"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"Windows"',
  'sec-fetch-dest': 'empty',
  'sec-fetch-mode': 'cors',
  'sec-fetch-site': 'same-origin',
  'Referer': 'https://neal.fun/infinite-craft/',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
};

/**
 * Contents of a fresh discoveries file, in order
 */
export const STARTING_DISCOVERIES: readonly DiscoveryRecord[] = [
  { name: 'Water', emoji: '💧', isFirstDiscovery: false },
  { name: 'Fire', emoji: '🔥', isFirstDiscovery: false },
  { name: 'Wind', emoji: '🌬️', isFirstDiscovery: false },
  { name: 'Earth', emoji: '🌍', isFirstDiscovery: false },
];

/**
 * What the mock server answers for pairs it has no recipe for
 */
export const MOCK_FALLBACK_RESULT: PairResponseBody = {
  result: '???',
  emoji: '🌌',
  isNew: false,
};
