import assert from 'node:assert/strict';
import test from 'node:test';
import { ConnectionError } from './errors.js';
import type { ListingCacheStore } from './listing-cache-store.js';
import { ListingCache, listingCacheKey, type CachedListing } from './listing-cache.js';
import { ManualClock } from './testing/manual-clock.js';
import type { Entry } from './types.js';

function file(dir: string, name: string): Entry {
  return { name, kind: 'file', size: 1, modifiedAt: '2024-01-01T00:00:00Z', path: `${dir}/${name}` };
}

class RecordingStore implements ListingCacheStore {
  public readonly saved = new Map<string, CachedListing>();
  public readonly deleted: string[] = [];

  public loadAll(): readonly CachedListing[] {
    return [...this.saved.values()];
  }

  public save(listing: CachedListing): void {
    this.saved.set(listing.key, listing);
  }

  public delete(key: string): void {
    this.deleted.push(key);
    this.saved.delete(key);
  }
}

test('serves a live listing without fetching again', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  let calls = 0;
  const fetch = async (): Promise<Entry[]> => {
    calls++;
    return [file('/movies', 'a.mp4')];
  };

  const first = await cache.getOrFetch('/movies', 'cred', fetch);
  const second = await cache.getOrFetch('/movies/', 'cred', fetch);

  assert.equal(calls, 1);
  assert.equal(first.fromCache, false);
  assert.equal(second.fromCache, true);
  assert.equal(second.entries, first.entries);
});

test('refetches once the ttl has elapsed', async () => {
  const clock = new ManualClock();
  const cache = new ListingCache({ clock });
  let calls = 0;
  const fetch = async (): Promise<Entry[]> => {
    calls++;
    return [];
  };

  await cache.getOrFetch('/docs', 'cred', fetch);
  await clock.advance(299_999);
  await cache.getOrFetch('/docs', 'cred', fetch);
  assert.equal(calls, 1);

  await clock.advance(1);
  const refreshed = await cache.getOrFetch('/docs', 'cred', fetch);
  assert.equal(calls, 2);
  assert.equal(refreshed.fromCache, false);
});

test('concurrent misses for one key share a single fetch', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  let calls = 0;
  let resolveFetch: (entries: Entry[]) => void = () => undefined;
  const fetch = (): Promise<Entry[]> => {
    calls++;
    return new Promise<Entry[]>((resolve) => {
      resolveFetch = resolve;
    });
  };

  const pending = Array.from({ length: 5 }, () => cache.getOrFetch('/hot', 'cred', fetch));
  assert.equal(calls, 1);

  const entries = [file('/hot', 'x.txt')];
  resolveFetch(entries);
  const results = await Promise.all(pending);

  assert.equal(calls, 1);
  for (const result of results) {
    assert.equal(result.entries, entries);
  }
  assert.equal(cache.size, 1);
});

test('a failed fetch reaches every waiter and is not cached', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  let calls = 0;
  let rejectFetch: (err: Error) => void = () => undefined;
  const failing = (): Promise<Entry[]> => {
    calls++;
    return new Promise<Entry[]>((_resolve, reject) => {
      rejectFetch = reject;
    });
  };

  const a = cache.getOrFetch('/flaky', 'cred', failing);
  const b = cache.getOrFetch('/flaky', 'cred', failing);
  rejectFetch(new ConnectionError('connection reset'));

  await Promise.all([assert.rejects(a, ConnectionError), assert.rejects(b, ConnectionError)]);
  assert.equal(cache.size, 0);

  await cache.getOrFetch('/flaky', 'cred', async () => []);
  assert.equal(calls, 1);
  assert.equal(cache.size, 1);
});

test('keys are per credential identity', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  let calls = 0;
  const fetch = async (): Promise<Entry[]> => {
    calls++;
    return [];
  };

  await cache.getOrFetch('/shared', 'cred-a', fetch);
  await cache.getOrFetch('/shared', 'cred-b', fetch);

  assert.equal(calls, 2);
  assert.notEqual(listingCacheKey('/shared', 'cred-a'), listingCacheKey('/shared', 'cred-b'));
  assert.equal(listingCacheKey('/shared/', 'cred-a'), listingCacheKey('/shared', 'cred-a'));
});

test('invalidating a path after an upload below it forces a refetch', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  let calls = 0;
  const fetch = async (): Promise<Entry[]> => {
    calls++;
    return [];
  };

  await cache.getOrFetch('/movies', 'cred', fetch);
  await cache.getOrFetch('/movies/sub', 'cred', fetch);
  await cache.getOrFetch('/other', 'cred', fetch);

  const removed = cache.invalidateForMutation('/movies/new.mp4');
  assert.equal(removed, 1);
  assert.equal(cache.peek('/movies', 'cred'), null);
  assert.notEqual(cache.peek('/movies/sub', 'cred'), null);

  const next = await cache.getOrFetch('/movies', 'cred', fetch);
  assert.equal(next.fromCache, false);
  assert.equal(calls, 4);
});

test('invalidate with descendants drops the subtree for every credential', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  const fetch = async (): Promise<Entry[]> => [];
  await cache.getOrFetch('/movies', 'cred-a', fetch);
  await cache.getOrFetch('/movies/sub', 'cred-b', fetch);
  await cache.getOrFetch('/moviesx', 'cred-a', fetch);

  assert.equal(cache.invalidate('/movies', { descendants: true }), 2);
  assert.deepEqual(
    cache.list().map((c) => c.path),
    ['/moviesx']
  );
});

test('an invalidation during a fetch keeps the late result out of the cache', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  let resolveFetch: (entries: Entry[]) => void = () => undefined;
  const pending = cache.getOrFetch(
    '/busy',
    'cred',
    () =>
      new Promise<Entry[]>((resolve) => {
        resolveFetch = resolve;
      })
  );

  cache.invalidate('/busy');
  resolveFetch([file('/busy', 'old.txt')]);

  const result = await pending;
  assert.equal(result.entries.length, 1);
  assert.equal(cache.size, 0);
});

test('entries can be removed by key or cleared per credential', async () => {
  const cache = new ListingCache({ clock: new ManualClock() });
  const fetch = async (): Promise<Entry[]> => [];
  await cache.getOrFetch('/a', 'cred-a', fetch);
  await cache.getOrFetch('/b', 'cred-a', fetch);
  await cache.getOrFetch('/a', 'cred-b', fetch);

  assert.equal(cache.remove(listingCacheKey('/b', 'cred-a')), true);
  assert.equal(cache.remove(listingCacheKey('/b', 'cred-a')), false);
  assert.equal(cache.clear('cred-a'), 1);
  assert.deepEqual(cache.keys(), [listingCacheKey('/a', 'cred-b')]);
});

test('ttl is clamped to the allowed range', () => {
  assert.equal(new ListingCache({ ttlMs: 1000 }).ttlMs, 60_000);
  assert.equal(new ListingCache({ ttlMs: 10_000_000 }).ttlMs, 3_600_000);
  assert.equal(new ListingCache().ttlMs, 300_000);
});

test('expired entries of never-revisited paths are swept on the next store', async () => {
  const clock = new ManualClock();
  const store = new RecordingStore();
  const cache = new ListingCache({ clock, store });
  const fetch = async (): Promise<Entry[]> => [];

  for (let i = 0; i < 1000; i++) {
    await cache.getOrFetch(`/dir-${i}`, 'cred', fetch);
  }
  assert.equal(cache.size, 1000);

  await clock.advance(10 * 3_600_000);
  assert.equal(cache.size, 0);
  assert.deepEqual(cache.keys(), []);
  assert.deepEqual(cache.list(), []);
  assert.equal(store.deleted.length, 0);

  await cache.getOrFetch('/fresh', 'cred', fetch);
  assert.equal(store.deleted.length, 1000);
  assert.deepEqual([...store.saved.keys()], [listingCacheKey('/fresh', 'cred')]);
  assert.deepEqual(cache.keys(), [listingCacheKey('/fresh', 'cred')]);
});

test('sweepExpired drops only entries past their ttl', async () => {
  const clock = new ManualClock();
  const cache = new ListingCache({ clock });
  const fetch = async (): Promise<Entry[]> => [];

  await cache.getOrFetch('/old', 'cred', fetch);
  await clock.advance(200_000);
  await cache.getOrFetch('/new', 'cred', fetch);
  await clock.advance(100_000);

  assert.equal(cache.sweepExpired(), 1);
  assert.deepEqual(
    cache.list().map((c) => c.path),
    ['/new']
  );
});

test('a store that fails to write does not break listing', async () => {
  const warnings: string[] = [];
  const failing: ListingCacheStore = {
    loadAll: () => [],
    save: () => {
      throw new Error('disk full');
    },
    delete: () => undefined,
  };
  const cache = new ListingCache({
    clock: new ManualClock(),
    store: failing,
    logger: { info: () => undefined, warn: (message) => warnings.push(message), error: () => undefined },
  });

  const result = await cache.getOrFetch('/docs', 'cred', async () => [file('/docs', 'a.txt')]);
  assert.equal(result.fromCache, false);
  assert.equal((await cache.getOrFetch('/docs', 'cred', async () => [])).fromCache, true);
  assert.deepEqual(warnings, ['listing_cache_persist_failed']);
});
