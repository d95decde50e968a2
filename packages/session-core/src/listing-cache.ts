import crypto from 'node:crypto';
import { systemClock, type Clock } from './clock.js';
import { errorMessage } from './errors.js';
import type { ListingCacheStore } from './listing-cache-store.js';
import { isSameOrDescendant, normalizeRemotePath, parentRemotePath } from './paths.js';
import type { Entry, Logger } from './types.js';
import { noopLogger } from './types.js';

export const DEFAULT_CACHE_TTL_MS = 300_000;
export const MIN_CACHE_TTL_MS = 60_000;
export const MAX_CACHE_TTL_MS = 3_600_000;

export interface CachedListing {
  readonly key: string;
  readonly path: string;
  readonly credentialId: string;
  readonly entries: readonly Entry[];
  readonly fetchedAt: number;
  readonly ttlMs: number;
}

export interface ListingResult {
  readonly entries: readonly Entry[];
  readonly fetchedAt: number;
  readonly fromCache: boolean;
}

export interface GetOrFetchOptions {
  readonly ttlMs?: number;
  /** Skip the cache entirely (neither read nor stored). */
  readonly bypass?: boolean;
}

export interface ListingCacheOptions {
  readonly ttlMs?: number;
  readonly clock?: Clock;
  /** Keeps listings across restarts; records are read on first use. */
  readonly store?: ListingCacheStore;
  readonly logger?: Logger;
}

interface InFlight {
  readonly path: string;
  readonly promise: Promise<ListingResult>;
  /** Set when the key is invalidated mid-fetch: waiters get the result, the cache does not. */
  stale: boolean;
}

export function clampCacheTtlMs(ttlMs: number): number {
  if (!Number.isFinite(ttlMs)) return DEFAULT_CACHE_TTL_MS;
  return Math.min(MAX_CACHE_TTL_MS, Math.max(MIN_CACHE_TTL_MS, Math.floor(ttlMs)));
}

export function listingCacheKey(path: string, credentialId: string): string {
  return crypto
    .createHash('sha256')
    .update(`${normalizeRemotePath(path)}\u0000${credentialId}`)
    .digest('hex')
    .slice(0, 16);
}

/**
 * Time-bounded listing cache keyed by (path, credential identity). Misses are
 * single-flight: concurrent callers for one key share a single fetch.
 * Expired entries are swept whenever a new listing is stored.
 */
export class ListingCache {
  private readonly entries = new Map<string, CachedListing>();
  private readonly inFlight = new Map<string, InFlight>();
  private readonly clock: Clock;
  private readonly store: ListingCacheStore | null;
  private readonly logger: Logger;
  private hydrated: boolean;
  private defaultTtlMs: number;

  public constructor(options: ListingCacheOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.store = options.store ?? null;
    this.logger = options.logger ?? noopLogger;
    this.hydrated = this.store === null;
    this.defaultTtlMs = clampCacheTtlMs(options.ttlMs ?? DEFAULT_CACHE_TTL_MS);
  }

  public get ttlMs(): number {
    return this.defaultTtlMs;
  }

  public setTtl(ttlMs: number): void {
    this.defaultTtlMs = clampCacheTtlMs(ttlMs);
  }

  public peek(path: string, credentialId: string): CachedListing | null {
    this.hydrate();
    const key = listingCacheKey(path, credentialId);
    const cached = this.entries.get(key);
    if (!cached) return null;
    if (this.isExpired(cached)) {
      this.drop(key);
      return null;
    }
    return cached;
  }

  public async getOrFetch(
    path: string,
    credentialId: string,
    fetch: () => Promise<readonly Entry[]>,
    options: GetOrFetchOptions = {}
  ): Promise<ListingResult> {
    if (options.bypass) {
      const entries = await fetch();
      return { entries, fetchedAt: this.clock.now(), fromCache: false };
    }

    const normalized = normalizeRemotePath(path);
    const key = listingCacheKey(normalized, credentialId);
    const cached = this.peek(normalized, credentialId);
    if (cached) {
      return { entries: cached.entries, fetchedAt: cached.fetchedAt, fromCache: true };
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending.promise;

    const ttlMs = clampCacheTtlMs(options.ttlMs ?? this.defaultTtlMs);
    const load = async (): Promise<ListingResult> => {
      const entries = await fetch();
      const fetchedAt = this.clock.now();
      if (!flight.stale) {
        this.put({ key, path: normalized, credentialId, entries, fetchedAt, ttlMs });
      }
      return { entries, fetchedAt, fromCache: false };
    };
    const flight: InFlight = {
      path: normalized,
      stale: false,
      promise: load().finally(() => {
        this.inFlight.delete(key);
      }),
    };
    this.inFlight.set(key, flight);
    return flight.promise;
  }

  /**
   * Drops the listing of `path` for every credential identity. With
   * `descendants`, listings below `path` go too.
   */
  public invalidate(path: string, options: { descendants?: boolean } = {}): number {
    this.hydrate();
    const target = normalizeRemotePath(path);
    const matches = (candidate: string): boolean =>
      options.descendants ? isSameOrDescendant(candidate, target) : candidate === target;
    let removed = 0;
    for (const cached of [...this.entries.values()]) {
      if (matches(cached.path) && this.drop(cached.key)) removed++;
    }
    for (const flight of this.inFlight.values()) {
      if (matches(flight.path)) flight.stale = true;
    }
    return removed;
  }

  /** A create/delete/upload at `path` stales its parent listing and everything at or below it. */
  public invalidateForMutation(path: string): number {
    const normalized = normalizeRemotePath(path);
    let removed = this.invalidate(normalized, { descendants: true });
    if (normalized !== '/') {
      removed += this.invalidate(parentRemotePath(normalized));
    }
    return removed;
  }

  public remove(key: string): boolean {
    this.hydrate();
    const flight = this.inFlight.get(key);
    if (flight) flight.stale = true;
    return this.drop(key);
  }

  /** Keys of live entries. */
  public keys(): readonly string[] {
    return this.list().map((cached) => cached.key);
  }

  /** Live entries; expired ones are left out even before they are swept. */
  public list(): readonly CachedListing[] {
    this.hydrate();
    return [...this.entries.values()].filter((cached) => !this.isExpired(cached));
  }

  /** Clears every entry, or only those fetched with `credentialId`. */
  public clear(credentialId?: string): number {
    this.hydrate();
    let removed = 0;
    for (const cached of [...this.entries.values()]) {
      if (credentialId !== undefined && cached.credentialId !== credentialId) continue;
      this.remove(cached.key);
      removed++;
    }
    return removed;
  }

  public get size(): number {
    return this.list().length;
  }

  /** Drops every expired entry; returns how many went. */
  public sweepExpired(): number {
    this.hydrate();
    let removed = 0;
    for (const cached of [...this.entries.values()]) {
      if (this.isExpired(cached) && this.drop(cached.key)) removed++;
    }
    return removed;
  }

  private isExpired(cached: CachedListing): boolean {
    return this.clock.now() - cached.fetchedAt >= cached.ttlMs;
  }

  private put(listing: CachedListing): void {
    this.sweepExpired();
    this.entries.set(listing.key, listing);
    if (!this.store) return;
    try {
      this.store.save(listing);
    } catch (error) {
      this.logger.warn('listing_cache_persist_failed', { key: listing.key, message: errorMessage(error) });
    }
  }

  private drop(key: string): boolean {
    const existed = this.entries.delete(key);
    if (existed && this.store) {
      try {
        this.store.delete(key);
      } catch (error) {
        this.logger.warn('listing_cache_delete_failed', { key, message: errorMessage(error) });
      }
    }
    return existed;
  }

  private hydrate(): void {
    if (this.hydrated || !this.store) return;
    this.hydrated = true;
    let stored: readonly CachedListing[];
    try {
      stored = this.store.loadAll();
    } catch (error) {
      this.logger.warn('listing_cache_load_failed', { message: errorMessage(error) });
      return;
    }
    for (const listing of stored) {
      this.entries.set(listing.key, listing);
      if (this.isExpired(listing)) this.drop(listing.key);
    }
    this.logger.info('listing_cache_loaded', { entries: this.entries.size, stored: stored.length });
  }
}
