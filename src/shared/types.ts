/**
 * Shared types
 */

/**
 * Session lifecycle: UNSTARTED -> OPEN -> CLOSED (terminal)
 */
export enum SessionState {
  UNSTARTED = 'unstarted',
  OPEN = 'open',
  CLOSED = 'closed',
}

/** One entry of the discoveries file */
export interface DiscoveryRecord {
  name: string | null;
  emoji: string | null;
  isFirstDiscovery: boolean | null;
}

/** Body of a successful pair answer */
export interface PairResponseBody {
  result: string;
  emoji: string;
  isNew: boolean;
}

/** Query parameters of the pair route */
export type PairQuery = {
  first: string;
  second: string;
};
