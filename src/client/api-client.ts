/**
 * ApiClient - HTTP transport for the pairing API.
 *
 * Holds the base URL and headers, and a keep-alive agent that lives between
 * start() and close(). Requests never throw for HTTP or network failures;
 * they resolve to a FetchResult the caller inspects.
 */

import * as http from 'http';
import * as https from 'https';
import { createLogger } from '../shared/logger';
import { config } from '../shared/config';
import { DEFAULT_HEADERS } from '../shared/constants';
import { InfiniteCraftError } from '../shared/errors';
import { buildUrl, fetchWithResult, FetchResult } from '../shared/fetch-utils';

const logger = createLogger('ApiClient');

export interface ApiClientOptions {
  /** Merged over DEFAULT_HEADERS */
  headers?: Record<string, string>;
  /** Request timeout in ms */
  timeout?: number;
}

export interface GetOptions {
  parseJson?: boolean;
}

export class ApiClient {
  readonly headers: Record<string, string>;
  private readonly timeout: number;
  private agent: http.Agent | null = null;
  private isClosed = false;

  constructor(readonly baseUrl: string, options: ApiClientOptions = {}) {
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.timeout = options.timeout ?? config.api.timeout;
  }

  get started(): boolean {
    return this.agent !== null;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Open the connection pool. Calling it twice is a no-op.
   */
  async start(): Promise<void> {
    if (this.isClosed) {
      throw new InfiniteCraftError('API client is closed');
    }
    if (this.agent) {
      return;
    }
    this.agent = this.baseUrl.startsWith('https:')
      ? new https.Agent({ keepAlive: true })
      : new http.Agent({ keepAlive: true });
    logger.debug(`Connection pool opened for ${this.baseUrl}`);
  }

  async get(route: string, query: Record<string, string> = {}, options: GetOptions = {}): Promise<FetchResult> {
    if (!this.agent) {
      throw new InfiniteCraftError('API client has not been started yet');
    }

    const url = buildUrl(this.baseUrl, route, query);
    const result = await fetchWithResult(url, {
      method: 'GET',
      headers: this.headers,
      agent: this.agent,
      timeout: this.timeout,
      parseJson: options.parseJson,
    });

    logger.debug(`GET ${url} -> ${result.status} ${result.statusText} (${result.elapsedMs}ms)`);
    return result;
  }

  /**
   * Release pooled sockets. Further requests fail.
   */
  async close(): Promise<void> {
    if (!this.agent) {
      throw new InfiniteCraftError('API client has not been started yet');
    }
    this.agent.destroy();
    this.agent = null;
    this.isClosed = true;
    logger.debug(`Connection pool closed for ${this.baseUrl}`);
  }
}
