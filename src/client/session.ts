/**
 * InfiniteCraftSession - entry point of the library.
 *
 * Owns the lifecycle (unstarted -> open -> closed), the API client, the rate
 * limiter and the discovery store. Every outbound request goes through here.
 */

import { createLogger, LogLevel, setLogLevel } from '../shared/logger';
import { config } from '../shared/config';
import { API_ROUTES, NOTHING_RESULT, PING_PAIR } from '../shared/constants';
import { pairResponseSchema } from '../shared/schemas';
import { ClientResponseError, SessionStateError } from '../shared/errors';
import { SessionState } from '../shared/types';
import type { PairQuery } from '../shared/types';
import { ApiClient } from './api-client';
import { RateLimiter } from './rate-limiter';
import { DiscoveryStore, GetDiscoveriesOptions } from './discovery-store';
import { Element, ElementClass, emptyElement } from './element';

const logger = createLogger('Session');

export interface SessionOptions {
  /** Base URL of the API; the pair route is appended */
  apiUrl?: string;
  /** Requests per minute, 0 = unlimited */
  apiRateLimit?: number;
  /** run() leaves start/close to the caller */
  manualControl?: boolean;
  /** Path of the discoveries JSON file */
  discoveriesStorage?: string;
  encoding?: BufferEncoding;
  /** Rewrite the discoveries file with the starting elements on start */
  doReset?: boolean;
  /** Create the discoveries file if it is missing */
  makeFile?: boolean;
  /** Write the in-memory discoveries on close */
  persistOnClose?: boolean;
  headers?: Record<string, string>;
  /** Request timeout in ms */
  timeout?: number;
  elementClass?: ElementClass;
  /** Log at debug level */
  debug?: boolean;
  /** Overrides the limiter built from apiRateLimit (tests inject a fake clock this way) */
  rateLimiter?: RateLimiter;
}

export interface PairOptions {
  /** Record a new result in the discoveries file (default true) */
  store?: boolean;
}

export class InfiniteCraftSession {
  readonly apiUrl: string;
  readonly manualControl: boolean;
  readonly store: DiscoveryStore;
  readonly rateLimiter: RateLimiter;

  private readonly client: ApiClient;
  private readonly elementClass: ElementClass;
  private readonly doReset: boolean;
  private readonly persistOnClose: boolean;
  private state: SessionState = SessionState.UNSTARTED;

  constructor(options: SessionOptions = {}) {
    const apiRateLimit = options.apiRateLimit ?? config.api.rateLimit;
    if (apiRateLimit < 0) {
      throw new RangeError('apiRateLimit must be greater than or equal to 0');
    }

    this.apiUrl = options.apiUrl ?? config.api.url;
    this.manualControl = options.manualControl ?? false;
    this.elementClass = options.elementClass ?? Element;
    this.doReset = options.doReset ?? false;
    this.persistOnClose = options.persistOnClose ?? false;

    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ limit: apiRateLimit });
    this.client = new ApiClient(this.apiUrl, {
      headers: options.headers,
      timeout: options.timeout,
    });
    this.store = new DiscoveryStore(options.discoveriesStorage ?? config.storage.discoveries, {
      encoding: options.encoding,
      makeFile: options.makeFile,
      elementClass: this.elementClass,
    });

    if (options.debug) {
      setLogLevel(LogLevel.DEBUG);
    }
  }

  /**
   * Write the starting discoveries to a file without opening a session.
   */
  static async reset(options: Pick<SessionOptions, 'discoveriesStorage' | 'encoding' | 'makeFile'> = {}): Promise<void> {
    await DiscoveryStore.reset(options.discoveriesStorage ?? config.storage.discoveries, {
      encoding: options.encoding,
      makeFile: options.makeFile,
    });
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * null before start(), false while open, true once closed
   */
  get closed(): boolean | null {
    switch (this.state) {
      case SessionState.UNSTARTED: return null;
      case SessionState.OPEN: return false;
      case SessionState.CLOSED: return true;
    }
  }

  /** Copy of the in-memory discoveries */
  get discoveries(): Element[] {
    return this.store.list();
  }

  async start(): Promise<void> {
    if (this.state === SessionState.OPEN) {
      throw new SessionStateError('Session is already running', this.state);
    }
    if (this.state === SessionState.CLOSED) {
      throw new SessionStateError('Session is closed', this.state);
    }

    if (this.doReset) {
      await this.store.reset();
    }
    await this.store.load();
    await this.client.start();

    this.state = SessionState.OPEN;
    logger.debug(`Session started (${this.apiUrl}, ${this.store.size} discoveries)`);
  }

  async close(): Promise<void> {
    if (this.state === SessionState.UNSTARTED) {
      throw new SessionStateError('Session has not been started yet', this.state);
    }
    if (this.state === SessionState.CLOSED) {
      throw new SessionStateError('Session is already closed', this.state);
    }

    this.state = SessionState.CLOSED;
    await this.client.close();
    if (this.persistOnClose) {
      await this.store.save();
    }
    logger.debug('Session closed');
  }

  /** Alias for close() */
  async stop(): Promise<void> {
    await this.close();
  }

  /**
   * Start (unless manualControl), run fn, and close again even if fn throws.
   */
  async run<T>(fn: (session: InfiniteCraftSession) => Promise<T>): Promise<T> {
    if (!this.manualControl) {
      await this.start();
    }
    try {
      return await fn(this);
    } finally {
      if (!this.manualControl) {
        await this.close();
      }
    }
  }

  /**
   * Round-trip time of a Fire + Water pairing, in milliseconds.
   * Unlike pair(), a failed request throws.
   */
  async ping(): Promise<number> {
    this.assertOpen('ping');

    await this.rateLimiter.acquire();
    // close() may have run while the limiter was waiting
    this.assertOpen('ping');
    const query: PairQuery = { ...PING_PAIR };
    const result = await this.client.get(API_ROUTES.PAIR, query, { parseJson: false });

    if (!result.ok) {
      throw new ClientResponseError(
        `Ping failed: ${result.status} ${result.statusText}${result.error ? ` (${result.error})` : ''}`,
        result.status
      );
    }

    logger.debug(`API response time: ${result.elapsedMs}ms`);
    return result.elapsedMs;
  }

  /**
   * Combine two elements.
   *
   * Never throws for upstream failures: anything other than a valid answer
   * comes back as the empty element (check with isEmpty()).
   */
  async pair(first: Element, second: Element, options: PairOptions = {}): Promise<Element> {
    if (!(first instanceof Element)) {
      throw new TypeError("first must be an instance of 'Element'");
    }
    if (!(second instanceof Element)) {
      throw new TypeError("second must be an instance of 'Element'");
    }
    this.assertOpen('pair');

    const shouldStore = options.store ?? true;
    logger.debug(`Pairing ${first.toString()} and ${second.toString()}...`);

    await this.rateLimiter.acquire();
    this.assertOpen('pair');
    const query: PairQuery = { first: first.name ?? '', second: second.name ?? '' };
    const response = await this.client.get(API_ROUTES.PAIR, query);

    if (!response.ok) {
      logger.warn(`Pairing ${first.toString()} + ${second.toString()} failed: ${response.status} ${response.statusText}`, response.error);
      return emptyElement(this.elementClass);
    }

    const parsed = pairResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.warn(`Unexpected pair response for ${first.toString()} + ${second.toString()}`, response.data);
      return emptyElement(this.elementClass);
    }

    const body = parsed.data;
    if (body.result === NOTHING_RESULT.result && body.emoji === NOTHING_RESULT.emoji) {
      logger.debug(`Unable to mix ${first.toString()} + ${second.toString()}`);
      return emptyElement(this.elementClass);
    }

    const result = new this.elementClass(body.result, body.emoji, body.isNew);
    logger.debug(
      `Result: ${result.toString()}${result.isFirstDiscovery ? ' (First Discovery)' : ''} ` +
      `(first: ${first.toString()} + second: ${second.toString()})`
    );

    if (shouldStore) {
      await this.store.add(result);
    }
    return result;
  }

  /** Alias for pair() */
  async merge(first: Element, second: Element, options?: PairOptions): Promise<Element> {
    return this.pair(first, second, options);
  }

  /** Alias for pair() */
  async combine(first: Element, second: Element, options?: PairOptions): Promise<Element> {
    return this.pair(first, second, options);
  }

  /**
   * All discoveries, re-read from the file
   */
  async getDiscoveries(options?: GetDiscoveriesOptions): Promise<Element[]> {
    return this.store.getDiscoveries(options);
  }

  /**
   * Case-sensitive lookup in memory; null when absent
   */
  getDiscovery(name: string): Element | null {
    return this.store.getDiscovery(name);
  }

  /**
   * Case-sensitive lookup against the file; null when absent
   */
  async findDiscovery(name: string): Promise<Element | null> {
    return this.store.findDiscovery(name);
  }

  toString(): string {
    return `<InfiniteCraftSession discoveries=${this.store.size} state=${this.state}>`;
  }

  private assertOpen(operation: string): void {
    if (this.state === SessionState.UNSTARTED) {
      throw new SessionStateError(`Cannot ${operation}: session has not been started yet`, this.state);
    }
    if (this.state === SessionState.CLOSED) {
      throw new SessionStateError(`Cannot ${operation}: session is closed`, this.state);
    }
  }
}
