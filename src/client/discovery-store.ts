/**
 * DiscoveryStore - ordered, name-unique list of discovered elements mirrored
 * to a JSON file.
 *
 * The file may be edited by other processes, so every read-modify-write goes
 * back to disk first; the in-memory list is only a cache of the last read.
 */

import * as fsp from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { createLogger } from '../shared/logger';
import { config } from '../shared/config';
import { STARTING_DISCOVERIES } from '../shared/constants';
import { discoveryFileSchema } from '../shared/schemas';
import { StorageError, isErrnoException, toErrorMessage } from '../shared/errors';
import type { DiscoveryRecord } from '../shared/types';
import { Element, ElementClass, elementFromRecord } from './element';

const logger = createLogger('DiscoveryStore');

export interface DiscoveryStoreOptions {
  encoding?: BufferEncoding;
  /** Spaces of JSON indentation */
  indent?: number;
  /** Create the file with the starting discoveries when it is missing */
  makeFile?: boolean;
  elementClass?: ElementClass;
}

export interface GetDiscoveriesOptions {
  /** Keep only elements the predicate accepts */
  check?: (element: Element) => boolean;
  /** Replace the in-memory list with the result */
  setValue?: boolean;
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fsp.stat(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/**
 * Inspect a storage path.
 *
 * Returns true if it is an existing writable file, false if it does not exist
 * yet (its parent directory is created when missing).
 */
export async function checkStorageFile(filePath: string): Promise<boolean> {
  const absolute = path.resolve(filePath);

  const stats = await statOrNull(absolute);
  if (stats) {
    if (!stats.isFile()) {
      throw new StorageError(`Path '${absolute}' is not a file`, 'NOT_FILE', absolute);
    }
    try {
      await fsp.access(absolute, fsp.constants.W_OK);
    } catch {
      throw new StorageError(`Path '${absolute}' is not writable`, 'NOT_WRITABLE', absolute);
    }
    return true;
  }

  const dir = path.dirname(absolute);
  const dirStats = await statOrNull(dir);
  if (!dirStats) {
    await fsp.mkdir(dir, { recursive: true });
  } else if (!dirStats.isDirectory()) {
    throw new StorageError(`Path '${dir}' is not a directory`, 'NOT_DIRECTORY', dir);
  }
  return false;
}

export class DiscoveryStore {
  private readonly encoding: BufferEncoding;
  private readonly indent: number;
  private readonly makeFile: boolean;
  private readonly elementClass: ElementClass;
  private discoveries: Element[] = [];

  constructor(readonly filePath: string, options: DiscoveryStoreOptions = {}) {
    this.encoding = options.encoding ?? config.storage.encoding;
    this.indent = options.indent ?? config.storage.indent;
    this.makeFile = options.makeFile ?? true;
    this.elementClass = options.elementClass ?? Element;
  }

  /**
   * Write the starting discoveries to a file.
   *
   * Without `makeFile` a missing file is an error rather than created.
   */
  static async reset(
    filePath: string,
    options: Pick<DiscoveryStoreOptions, 'encoding' | 'indent' | 'makeFile'> = {}
  ): Promise<void> {
    const exists = await checkStorageFile(filePath);
    if (!exists && !options.makeFile) {
      throw new StorageError(`File '${filePath}' not found`, 'NOT_FOUND', filePath);
    }
    await writeRecords(
      filePath,
      STARTING_DISCOVERIES,
      options.encoding ?? config.storage.encoding,
      options.indent ?? config.storage.indent
    );
  }

  /**
   * Ensure the file exists (creating the defaults if allowed) and load it.
   */
  async load(): Promise<Element[]> {
    const exists = await checkStorageFile(this.filePath);
    if (!exists) {
      if (!this.makeFile) {
        throw new StorageError(`File '${this.filePath}' not found`, 'NOT_FOUND', this.filePath);
      }
      logger.warn(`Creating discoveries file with starting elements (${this.filePath})`);
      await this.writeFile(STARTING_DISCOVERIES);
    }

    this.discoveries = await this.readFile();
    logger.debug(`Loaded ${this.discoveries.length} discoveries from ${this.filePath}`);
    return this.list();
  }

  /**
   * Restore exactly the starting discoveries, on disk and in memory.
   */
  async reset(): Promise<void> {
    logger.warn(`Resetting discoveries file (${this.filePath})`);
    await DiscoveryStore.reset(this.filePath, {
      encoding: this.encoding,
      indent: this.indent,
      makeFile: this.makeFile,
    });
    this.discoveries = STARTING_DISCOVERIES.map(record => elementFromRecord(record, this.elementClass));
  }

  /** Copy of the in-memory list */
  list(): Element[] {
    return [...this.discoveries];
  }

  get size(): number {
    return this.discoveries.length;
  }

  /**
   * Case-sensitive exact lookup in memory
   */
  getDiscovery(name: string): Element | null {
    return this.discoveries.find(element => element.name === name) ?? null;
  }

  /**
   * Case-sensitive exact lookup against the file
   */
  async findDiscovery(name: string): Promise<Element | null> {
    const found = await this.getDiscoveries({ check: element => element.name === name });
    return found[0] ?? null;
  }

  has(name: string): boolean {
    return this.getDiscovery(name) !== null;
  }

  /**
   * Reload from disk, optionally filter, optionally keep the result in memory.
   */
  async getDiscoveries(options: GetDiscoveriesOptions = {}): Promise<Element[]> {
    const all = await this.readFile();
    const discoveries = options.check ? all.filter(options.check) : all;

    if (options.setValue) {
      this.discoveries = [...discoveries];
    }
    return discoveries;
  }

  /**
   * Append an element if its name is not in the file yet, then refresh memory
   * from the file. Returns whether the file changed.
   */
  async add(element: Element): Promise<boolean> {
    const current = await this.readFile();

    if (current.some(existing => existing.name === element.name)) {
      this.discoveries = current;
      return false;
    }

    current.push(element);
    await this.writeFile(current.map(e => e.toRecord()));
    this.discoveries = current;
    logger.debug(`Stored discovery ${element.toString()}`);
    return true;
  }

  /**
   * Overwrite the file with the in-memory list
   */
  async save(): Promise<void> {
    await this.writeFile(this.discoveries.map(e => e.toRecord()));
  }

  private async readFile(): Promise<Element[]> {
    const raw = await fsp.readFile(this.filePath, { encoding: this.encoding });

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(
        `File '${this.filePath}' is not valid JSON: ${toErrorMessage(error)}`,
        'INVALID_FORMAT',
        this.filePath
      );
    }

    const result = discoveryFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(
        `File '${this.filePath}' is not a list of discoveries: ${result.error.issues[0]?.message ?? 'invalid'}`,
        'INVALID_FORMAT',
        this.filePath
      );
    }

    return result.data.map(record => elementFromRecord(record, this.elementClass));
  }

  private async writeFile(records: readonly DiscoveryRecord[]): Promise<void> {
    await writeRecords(this.filePath, records, this.encoding, this.indent);
  }
}

async function writeRecords(
  filePath: string,
  records: readonly DiscoveryRecord[],
  encoding: BufferEncoding,
  indent: number
): Promise<void> {
  await fsp.writeFile(filePath, JSON.stringify(records, null, indent), { encoding });
}
