/**
 * Unit Tests for ApiClient
 */

// Must mock before any imports that use them
jest.mock('node-fetch', () => ({
  __esModule: true,
  default: jest.fn(),
}));
jest.mock('../shared/logger', () => ({
  createLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  })
}));

import { describe, it, expect, beforeEach } from '@jest/globals';
import * as http from 'http';
import * as https from 'https';
import fetch from 'node-fetch';
import { ApiClient } from './api-client';
import { DEFAULT_HEADERS } from '../shared/constants';
import { InfiniteCraftError } from '../shared/errors';
import { jsonResponse } from '../__tests__/helpers/fetch-stand-in';

const fetchMock = jest.mocked(fetch);

describe('ApiClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockResolvedValue(jsonResponse({ result: 'Steam', emoji: '💨', isNew: false }));
  });

  it('merges custom headers over the defaults', () => {
    const client = new ApiClient('http://x', { headers: { 'User-Agent': 'tests' } });
    expect(client.headers).toEqual({ ...DEFAULT_HEADERS, 'User-Agent': 'tests' });
  });

  it('refuses requests before start', async () => {
    const client = new ApiClient('http://x');
    await expect(client.get('/pair')).rejects.toBeInstanceOf(InfiniteCraftError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends GET requests through a keep-alive agent', async () => {
    const client = new ApiClient('http://x/api/', { timeout: 1234 });
    await client.start();

    const result = await client.get('/pair', { first: 'Fire', second: 'Water' });

    expect(result.data).toEqual({ result: 'Steam', emoji: '💨', isNew: false });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://x/api/pair?first=Fire&second=Water');
    expect(init).toMatchObject({ method: 'GET', timeout: 1234, headers: client.headers });
    expect(init?.agent).toBeInstanceOf(http.Agent);
    await client.close();
  });

  it('uses an https agent for https URLs', async () => {
    const client = new ApiClient('https://x');
    await client.start();
    await client.get('/pair');
    expect(fetchMock.mock.calls[0][1]?.agent).toBeInstanceOf(https.Agent);
    await client.close();
  });

  it('treats a second start as a no-op', async () => {
    const client = new ApiClient('http://x');
    await client.start();
    await client.start();
    expect(client.started).toBe(true);
    await client.close();
  });

  it('cannot be reopened or used after close', async () => {
    const client = new ApiClient('http://x');
    await client.start();
    await client.close();

    expect(client.closed).toBe(true);
    expect(client.started).toBe(false);
    await expect(client.start()).rejects.toThrow('API client is closed');
    await expect(client.get('/pair')).rejects.toThrow('API client has not been started yet');
  });

  it('refuses to close before start', async () => {
    await expect(new ApiClient('http://x').close()).rejects.toBeInstanceOf(InfiniteCraftError);
  });
});
