/**
 * MockApiServer - HTTP server speaking the pairing API wire contract,
 * for offline use and integration tests.
 */

import * as http from 'http';
import type { AddressInfo } from 'net';
import { createLogger } from '../shared/logger';
import { config } from '../shared/config';
import { toErrorMessage } from '../shared/errors';
import { PairMock, loadRecipeBook } from './pair-mock';

const logger = createLogger('MockApi');

export interface MockApiServerOptions {
  host?: string;
  /** 0 picks a free port */
  port?: number;
  mock?: PairMock;
}

export class MockApiServer {
  readonly mock: PairMock;
  private readonly host: string;
  private readonly port: number;
  private server: http.Server | null = null;
  private address: AddressInfo | null = null;

  constructor(options: MockApiServerOptions = {}) {
    this.host = options.host ?? config.mock.host;
    this.port = options.port ?? config.mock.port;
    this.mock = options.mock ?? new PairMock();
  }

  /**
   * Base URL to hand to a session as `apiUrl`
   */
  get url(): string {
    if (!this.address) {
      throw new Error('Mock API server is not listening');
    }
    return `http://${this.host}:${this.address.port}`;
  }

  get listening(): boolean {
    return this.server !== null;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Mock API server is already listening');
    }

    const server = http.createServer((req, res) => this.handle(req, res));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      throw new Error(`Unexpected server address: ${String(address)}`);
    }

    this.server = server;
    this.address = address;
    logger.info(`Mock API listening on http://${this.host}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    this.address = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('Mock API stopped');
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    const method = req.method ?? 'GET';
    const url = req.url ?? '/';

    try {
      const result = this.mock.match(method, url);

      if (!result) {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Not Found' }));
        return;
      }

      if (result.payload) {
        logger.info(`PAIR ${url} -> ${result.payload.emoji} ${result.payload.result}`);
      }

      res.writeHead(result.status, { 'Content-Type': result.contentType });
      res.end(result.body);
    } catch (error) {
      logger.error(`Failed to answer ${method} ${url}`, error);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: toErrorMessage(error) }));
    }
  }
}

/**
 * Start a mock server from the configuration (host, port, optional recipe file).
 */
export async function startMockServer(options: MockApiServerOptions = {}): Promise<MockApiServer> {
  const mock = options.mock ?? new PairMock();
  if (!options.mock && config.mock.recipes) {
    const book = await loadRecipeBook(config.mock.recipes);
    mock.addRecipeBook(book);
    logger.info(`Loaded ${book.recipes.length} recipes from ${book.name}`);
  }

  const server = new MockApiServer({ ...options, mock });
  await server.start();
  return server;
}
