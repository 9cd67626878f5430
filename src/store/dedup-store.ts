/**
 * Dedup Store
 *
 * Persists the identities of listings that were already notified, as a JSON
 * array of strings. The set only grows.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { Identity, ListingRecord } from '../types/index.js';

const identityListSchema = z.array(z.string());

/**
 * Title and link joined by `-`, the key format of existing sent-id files
 */
export function identityOf(record: Pick<ListingRecord, 'title' | 'link'>): Identity {
  return `${record.title}-${record.link}`;
}

export interface FilterResult<T> {
  newRecords: T[];
  updated: Set<Identity>;
}

/**
 * Split candidates into records not yet known, keeping the first occurrence
 * of each identity in encounter order. `known` is left untouched.
 */
export function filterNew<T extends Pick<ListingRecord, 'title' | 'link'>>(
  candidates: readonly T[],
  known: ReadonlySet<Identity>
): FilterResult<T> {
  const updated = new Set(known);
  const newRecords: T[] = [];

  for (const candidate of candidates) {
    const id = identityOf(candidate);
    if (updated.has(id)) {
      continue;
    }
    updated.add(id);
    newRecords.push(candidate);
  }

  return { newRecords, updated };
}

export function storePathFor(dataDir: string, domain: string): string {
  return join(dataDir, `sent-${domain}-ids.json`);
}

/**
 * Persistence boundary for one domain's identity set
 */
export interface IdentityStore {
  load(): Promise<Set<Identity>>;
  save(ids: ReadonlySet<Identity>): Promise<boolean>;
}

export class DedupStore implements IdentityStore {
  constructor(readonly filePath: string) {}

  /**
   * Missing, unreadable or malformed files all load as an empty set
   */
  async load(): Promise<Set<Identity>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.info({ path: this.filePath }, 'No dedup file yet, starting empty');
      } else {
        logger.error({ error, path: this.filePath }, 'Failed to read dedup file');
      }
      return new Set();
    }

    try {
      const parsed = identityListSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.error({ path: this.filePath }, 'Dedup file is not an array of strings, ignoring it');
        return new Set();
      }

      logger.info({ path: this.filePath, count: parsed.data.length }, 'Loaded dedup records');
      return new Set(parsed.data);
    } catch (error) {
      logger.error({ error, path: this.filePath }, 'Dedup file is not valid JSON, ignoring it');
      return new Set();
    }
  }

  /**
   * Rewrite the whole file. Resolves false on failure; the previous file is
   * left as it was.
   */
  async save(ids: ReadonlySet<Identity>): Promise<boolean> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify([...ids], null, 2), 'utf-8');
      logger.debug({ path: this.filePath, count: ids.size }, 'Saved dedup records');
      return true;
    } catch (error) {
      logger.error({ error, path: this.filePath }, 'Failed to save dedup file');
      return false;
    }
  }
}
