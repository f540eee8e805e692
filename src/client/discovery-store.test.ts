/**
 * Unit Tests for DiscoveryStore
 * Runs against real files in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { DiscoveryStore, checkStorageFile } from './discovery-store';
import { Element } from './element';
import { StorageError } from '../shared/errors';
import { STARTING_DISCOVERIES } from '../shared/constants';
import { makeTempDir, readJson, removeTempDir } from '../__tests__/helpers/temp-dir';

// Mock logger to prevent console spam during tests
jest.mock('../shared/logger', () => ({
  createLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  })
}));

class TaggedElement extends Element {}

const STARTING_NAMES = ['Water', 'Fire', 'Wind', 'Earth'];

function names(elements: Element[]): Array<string | null> {
  return elements.map(e => e.name);
}

describe('DiscoveryStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir('discoveries-');
    filePath = path.join(dir, 'discoveries.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeDiscoveries(records: unknown): Promise<void> {
    await fsp.writeFile(filePath, JSON.stringify(records), { encoding: 'utf-8' });
  }

  describe('load', () => {
    it('creates the file with the starting discoveries when missing', async () => {
      const store = new DiscoveryStore(filePath);
      const loaded = await store.load();

      expect(names(loaded)).toEqual(STARTING_NAMES);
      const raw = await fsp.readFile(filePath, { encoding: 'utf-8' });
      expect(raw).toBe(JSON.stringify(STARTING_DISCOVERIES, null, 2));
    });

    it('creates missing parent directories', async () => {
      const nested = path.join(dir, 'a', 'b', 'discoveries.json');
      const store = new DiscoveryStore(nested);
      await store.load();
      expect(await readJson(nested)).toEqual(STARTING_DISCOVERIES);
    });

    it('fails with NOT_FOUND when the file is missing and makeFile is off', async () => {
      const store = new DiscoveryStore(filePath, { makeFile: false });
      await expect(store.load()).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('reads an existing file as-is', async () => {
      await writeDiscoveries([{ name: 'Steam', emoji: '💨', isFirstDiscovery: false }]);
      const store = new DiscoveryStore(filePath, { makeFile: false });
      const loaded = await store.load();
      expect(loaded.map(e => e.toRecord())).toEqual([{ name: 'Steam', emoji: '💨', isFirstDiscovery: false }]);
    });

    it('fills in absent emoji and first-discovery fields', async () => {
      await writeDiscoveries([{ name: 'Steam' }]);
      const store = new DiscoveryStore(filePath);
      const [steam] = await store.load();
      expect(steam.toRecord()).toEqual({ name: 'Steam', emoji: null, isFirstDiscovery: null });
    });

    it('fails with INVALID_FORMAT on broken JSON', async () => {
      await fsp.writeFile(filePath, '{not json', { encoding: 'utf-8' });
      const store = new DiscoveryStore(filePath);
      await expect(store.load()).rejects.toMatchObject({ code: 'INVALID_FORMAT' });
    });

    it('fails with INVALID_FORMAT when entries have no name', async () => {
      await writeDiscoveries([{ foo: 1 }]);
      const store = new DiscoveryStore(filePath);
      await expect(store.load()).rejects.toBeInstanceOf(StorageError);
      await expect(store.load()).rejects.toMatchObject({ code: 'INVALID_FORMAT' });
    });

    it('builds elements with the configured class', async () => {
      const store = new DiscoveryStore(filePath, { elementClass: TaggedElement });
      const loaded = await store.load();
      expect(loaded.every(e => e instanceof TaggedElement)).toBe(true);
    });
  });

  describe('checkStorageFile', () => {
    it('is false for a missing file and true once it exists', async () => {
      expect(await checkStorageFile(filePath)).toBe(false);
      await writeDiscoveries([]);
      expect(await checkStorageFile(filePath)).toBe(true);
    });

    it('fails with NOT_FILE for a directory', async () => {
      await expect(checkStorageFile(dir)).rejects.toMatchObject({ code: 'NOT_FILE' });
    });

    it('fails with NOT_DIRECTORY when the parent is a file', async () => {
      const blocker = path.join(dir, 'blocker');
      await fsp.writeFile(blocker, '', { encoding: 'utf-8' });
      await expect(checkStorageFile(path.join(blocker, 'discoveries.json'))).rejects.toMatchObject({
        code: 'NOT_DIRECTORY',
        path: blocker,
      });
    });
  });

  describe('lookups', () => {
    it('finds discoveries by exact, case-sensitive name', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();

      expect(store.getDiscovery('Fire')?.emoji).toBe('🔥');
      expect(store.getDiscovery('fire')).toBeNull();
      expect(store.has('Earth')).toBe(true);
      expect(store.has('Steam')).toBe(false);
    });

    it('findDiscovery reads the file, getDiscovery only memory', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();
      await writeDiscoveries([...STARTING_DISCOVERIES, { name: 'Steam', emoji: '💨', isFirstDiscovery: false }]);

      expect(store.getDiscovery('Steam')).toBeNull();
      expect((await store.findDiscovery('Steam'))?.name).toBe('Steam');
      expect(await store.findDiscovery('Plasma')).toBeNull();
    });
  });

  describe('add', () => {
    it('appends a new discovery to file and memory', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();

      const added = await store.add(new Element('Steam', '💨', false));

      expect(added).toBe(true);
      expect(names(store.list())).toEqual([...STARTING_NAMES, 'Steam']);
      expect(await readJson(filePath)).toEqual([
        ...STARTING_DISCOVERIES,
        { name: 'Steam', emoji: '💨', isFirstDiscovery: false },
      ]);
    });

    it('skips a name already in the file', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();

      const added = await store.add(new Element('Fire', '🔥', true));

      expect(added).toBe(false);
      expect(store.size).toBe(4);
      expect(await readJson(filePath)).toEqual(STARTING_DISCOVERIES);
    });

    it('keeps entries written by someone else', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();
      await writeDiscoveries([...STARTING_DISCOVERIES, { name: 'Lava', emoji: '🌋', isFirstDiscovery: false }]);

      await store.add(new Element('Steam', '💨', false));

      expect(names(store.list())).toEqual([...STARTING_NAMES, 'Lava', 'Steam']);
      expect(names(await store.getDiscoveries())).toEqual([...STARTING_NAMES, 'Lava', 'Steam']);
    });
  });

  describe('getDiscoveries', () => {
    it('filters without touching memory by default', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();

      const filtered = await store.getDiscoveries({ check: e => e.name?.startsWith('W') ?? false });

      expect(names(filtered)).toEqual(['Water', 'Wind']);
      expect(store.size).toBe(4);
    });

    it('replaces memory with setValue, and save writes it back', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();

      await store.getDiscoveries({ check: e => e.name === 'Fire', setValue: true });
      expect(names(store.list())).toEqual(['Fire']);

      await store.save();
      expect(await readJson(filePath)).toEqual([{ name: 'Fire', emoji: '🔥', isFirstDiscovery: false }]);
    });
  });

  describe('reset', () => {
    it('restores exactly the starting discoveries', async () => {
      const store = new DiscoveryStore(filePath);
      await store.load();
      await store.add(new Element('Steam', '💨', false));

      await store.reset();

      expect(names(store.list())).toEqual(STARTING_NAMES);
      expect(await readJson(filePath)).toEqual(STARTING_DISCOVERIES);
    });

    it('static reset refuses a missing file unless makeFile is set', async () => {
      await expect(DiscoveryStore.reset(filePath)).rejects.toMatchObject({ code: 'NOT_FOUND' });

      await DiscoveryStore.reset(filePath, { makeFile: true });
      expect(await readJson(filePath)).toEqual(STARTING_DISCOVERIES);
    });

    it('honours the indent option', async () => {
      await DiscoveryStore.reset(filePath, { makeFile: true, indent: 4 });
      const raw = await fsp.readFile(filePath, { encoding: 'utf-8' });
      expect(raw).toBe(JSON.stringify(STARTING_DISCOVERIES, null, 4));
    });
  });
});
