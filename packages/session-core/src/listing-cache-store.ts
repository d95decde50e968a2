import fs from 'node:fs';
import path from 'node:path';
import { readJsonFile, writeJsonFileAtomic } from './json-file.js';
import type { CachedListing } from './listing-cache.js';
import type { Entry } from './types.js';

/** Durable backing for ListingCache records. Calls may throw; the cache logs and carries on. */
export interface ListingCacheStore {
  loadAll(): readonly CachedListing[];
  save(listing: CachedListing): void;
  delete(key: string): void;
}

const RECORD_NAME_RE = /^([0-9a-f]{16})\.json$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(value: unknown): Entry | null {
  if (!isRecord(value)) return null;
  const { name, kind, size, modifiedAt } = value;
  const entryPath = value['path'];
  if (typeof name !== 'string' || typeof modifiedAt !== 'string' || typeof entryPath !== 'string') return null;
  if (kind !== 'directory' && kind !== 'file') return null;
  if (typeof size !== 'number' || !Number.isFinite(size)) return null;
  return { name, kind, size, modifiedAt, path: entryPath };
}

export function parseCachedListing(value: unknown): CachedListing | null {
  if (!isRecord(value)) return null;
  const { key, credentialId, fetchedAt, ttlMs, entries } = value;
  const listingPath = value['path'];
  if (typeof key !== 'string' || typeof listingPath !== 'string' || typeof credentialId !== 'string') return null;
  if (typeof fetchedAt !== 'number' || typeof ttlMs !== 'number') return null;
  if (!Array.isArray(entries)) return null;
  const parsed: Entry[] = [];
  for (const raw of entries) {
    const entry = parseEntry(raw);
    if (!entry) return null;
    parsed.push(entry);
  }
  return { key, path: listingPath, credentialId, entries: parsed, fetchedAt, ttlMs };
}

/** One JSON record per cache key under `dir`, written through a temp file and rename. */
export class FileListingCacheStore implements ListingCacheStore {
  public constructor(private readonly dir: string) {}

  public loadAll(): readonly CachedListing[] {
    if (!fs.existsSync(this.dir)) return [];
    const listings: CachedListing[] = [];
    for (const name of fs.readdirSync(this.dir)) {
      const match = RECORD_NAME_RE.exec(name);
      if (!match) continue;
      const listing = parseCachedListing(readJsonFile(path.join(this.dir, name)));
      if (listing && listing.key === match[1]) {
        listings.push(listing);
      } else {
        fs.rmSync(path.join(this.dir, name), { force: true });
      }
    }
    return listings;
  }

  public save(listing: CachedListing): void {
    writeJsonFileAtomic(this.recordPath(listing.key), listing);
  }

  public delete(key: string): void {
    fs.rmSync(this.recordPath(key), { force: true });
  }

  private recordPath(key: string): string {
    if (!/^[0-9a-f]{16}$/.test(key)) {
      throw new Error(`Invalid listing cache key: ${key}`);
    }
    return path.join(this.dir, `${key}.json`);
  }
}
