import assert from 'node:assert/strict';
import test from 'node:test';
import {
  ConnectionError,
  IndexOutOfRangeError,
  InvalidTargetError,
  NoActiveListingError,
  NoParentError,
  SizeLimitExceededError,
} from './errors.js';
import { ListingCache } from './listing-cache.js';
import { NavigationController, stagingFileName } from './navigation-controller.js';
import { SessionStore, type SessionIdentity } from './session-store.js';
import type { Profile } from './settings-store.js';
import { FakeRemoteFileService } from './testing/fake-remote.js';
import { ManualClock } from './testing/manual-clock.js';
import { staticProfiles, testProfile } from './testing/profiles.js';

const alice: SessionIdentity = { userId: 'alice', scope: 'private' };

function setup(profile: Profile = testProfile()) {
  const clock = new ManualClock();
  const remote = new FakeRemoteFileService()
    .addDirectory('/movies')
    .addDirectory('/docs')
    .addFile('/notes.txt', 'hello')
    .addFile('/docs/report.txt', 'quarterly');
  const sessions = new SessionStore({ clock });
  const cache = new ListingCache({ clock });
  const navigation = new NavigationController({ sessions, cache, remote, profiles: staticProfiles(profile), clock });
  return { clock, remote, sessions, cache, navigation };
}

function names(view: { page: { items: readonly { name: string }[] } }): string[] {
  return view.page.items.map((e) => e.name);
}

test('ls lists sorted entries and serves repeats from the cache', async () => {
  const { navigation, remote } = setup();

  const first = await navigation.list(alice);
  assert.equal(first.kind, 'listing');
  if (first.kind !== 'listing') return;
  assert.deepEqual(names(first.view), ['docs', 'movies', 'notes.txt']);
  assert.equal(first.view.fromCache, false);

  const second = await navigation.list(alice);
  assert.equal(second.kind === 'listing' && second.view.fromCache, true);
  assert.equal(remote.count('list', '/'), 1);
  assert.equal(navigation.snapshot(alice).mode, 'browsing');
});

test('descending by index pushes the path and quit returns', async () => {
  const { navigation } = setup();
  await navigation.list(alice);

  const inside = await navigation.list(alice, 1);
  assert.equal(inside.kind === 'listing' && inside.view.path, '/docs');
  if (inside.kind === 'listing') assert.deepEqual(names(inside.view), ['report.txt']);
  assert.equal(navigation.snapshot(alice).depth, 1);

  const back = await navigation.quit(alice);
  assert.equal(back.path, '/');
  assert.equal(navigation.snapshot(alice).depth, 0);

  await assert.rejects(navigation.quit(alice), NoParentError);
  assert.equal(navigation.snapshot(alice).currentPath, '/');
});

test('an index needs a listing and must be on the current page', async () => {
  const { navigation } = setup();

  await assert.rejects(navigation.list(alice, 1), NoActiveListingError);
  await navigation.list(alice);
  await assert.rejects(navigation.list(alice, 4), IndexOutOfRangeError);
  assert.equal(navigation.snapshot(alice).currentPath, '/');
});

test('indices resolve against the listing currently shown', async () => {
  const { navigation } = setup();
  await navigation.list(alice);
  await navigation.list(alice, 1);

  await assert.rejects(navigation.list(alice, 2), IndexOutOfRangeError);
  await assert.rejects(navigation.download(alice, 3), IndexOutOfRangeError);
  assert.equal(navigation.snapshot(alice).currentPath, '/docs');

  const inner = await navigation.download(alice, 1);
  assert.equal(inner.kind === 'link' && inner.link.entry.path, '/docs/report.txt');

  await navigation.quit(alice);
  const outcome = await navigation.list(alice, 3);
  assert.equal(outcome.kind === 'link' && outcome.link.entry.path, '/notes.txt');
  const folder = await navigation.list(alice, 1);
  assert.equal(folder.kind === 'listing' && folder.view.path, '/docs');
});

test('a file index yields a link without leaving the directory', async () => {
  const { navigation } = setup();
  await navigation.list(alice);

  const outcome = await navigation.list(alice, 3);
  assert.equal(outcome.kind, 'link');
  if (outcome.kind !== 'link') return;
  assert.equal(outcome.link.url, 'https://files.test/d/notes.txt');
  assert.equal(outcome.link.entry.path, '/notes.txt');
  assert.equal(navigation.snapshot(alice).view?.path, '/');
});

test('a directory path jumps without growing the stack', async () => {
  const { navigation, remote } = setup();

  const outcome = await navigation.list(alice, '/movies');
  assert.equal(outcome.kind === 'listing' && outcome.view.path, '/movies');
  assert.equal(navigation.snapshot(alice).depth, 0);
  assert.equal(remote.count('info', '/movies'), 1);

  await navigation.list(alice, '/');
  assert.equal(remote.count('info', '/'), 0);
});

test('a file path yields a retrieval descriptor with a staging name', async () => {
  const { navigation } = setup();

  const outcome = await navigation.list(alice, 'notes.txt');
  assert.equal(outcome.kind, 'retrieval');
  if (outcome.kind !== 'retrieval') return;
  assert.equal(outcome.retrieval.url, 'https://files.test/d/notes.txt');
  assert.equal(outcome.retrieval.stagingName, 'alice_1700000000_notes.txt');
  assert.equal(outcome.retrieval.entry.size, 5);
});

test('staging names keep letters, digits and a few separators', () => {
  assert.equal(stagingFileName('u/1', 'my file?.txt', 1_700_000_000_999), 'u1_1700000000_my file.txt');
  assert.equal(stagingFileName('bob', '???', 0), 'bob_0_file');
});

test('downloads over the size limit are refused', async () => {
  const base = testProfile();
  const { navigation } = setup(testProfile({ limits: { ...base.limits, maxDownloadBytes: 3 } }));

  await assert.rejects(navigation.download(alice, '/notes.txt'), SizeLimitExceededError);
  await assert.rejects(navigation.download(alice, '/docs'), InvalidTargetError);
});

test('download by index returns a link', async () => {
  const { navigation } = setup();
  await navigation.list(alice);

  const outcome = await navigation.download(alice, 3);
  assert.equal(outcome.kind === 'link' && outcome.link.url, 'https://files.test/d/notes.txt');
  await assert.rejects(navigation.download(alice, 1), InvalidTargetError);
});

test('a failed listing leaves the session where it was', async () => {
  const { navigation, remote } = setup();
  remote.addDirectory('/broken').failOn('list', '/broken', new ConnectionError('connection reset'));
  await navigation.list(alice);
  const before = navigation.snapshot(alice);

  await assert.rejects(navigation.list(alice, '/broken'), ConnectionError);

  const after = navigation.snapshot(alice);
  assert.equal(after.currentPath, '/');
  assert.equal(after.view?.generation, before.view?.generation);
});

test('paging stops at both ends', async () => {
  const { navigation, remote } = setup(testProfile({ pageSize: 10 }));
  for (let i = 1; i <= 25; i++) {
    remote.addFile(`/many/f${String(i).padStart(2, '0')}.txt`, 'x');
  }
  await navigation.list(alice, '/many');

  const forward: Array<[number, boolean]> = [];
  for (let i = 0; i < 3; i++) {
    const move = await navigation.next(alice);
    forward.push([move.view.page.pageIndex, move.boundary]);
  }
  assert.deepEqual(forward, [
    [1, false],
    [2, false],
    [2, true],
  ]);
  const last = navigation.snapshot(alice).view;
  assert.deepEqual(last && names(last), ['f21.txt', 'f22.txt', 'f23.txt', 'f24.txt', 'f25.txt']);

  await navigation.prev(alice);
  await navigation.prev(alice);
  const atStart = await navigation.prev(alice);
  assert.equal(atStart.boundary, true);
  assert.equal(atStart.view.page.firstOrdinal, 1);
});

test('search is never cached and switches the session to searching', async () => {
  const { navigation, remote } = setup();
  remote.addFile('/docs/notes-old.txt', 'old');

  const view = await navigation.search(alice, 'NOTES');
  assert.deepEqual(names(view), ['notes-old.txt', 'notes.txt']);
  assert.equal(view.term, 'NOTES');
  await navigation.search(alice, 'NOTES');

  assert.equal(remote.count('search', '/'), 2);
  assert.equal(navigation.snapshot(alice).mode, 'searching');
  await assert.rejects(navigation.search(alice, '   '), InvalidTargetError);
});

test('mkdir drops a stale view of the parent and the next ls refetches', async () => {
  const { navigation, remote } = setup();
  await navigation.list(alice);

  assert.equal(await navigation.mkdir(alice, 'new'), '/new');
  assert.equal(navigation.snapshot(alice).view, null);

  const relisted = await navigation.list(alice);
  assert.equal(remote.count('list', '/'), 2);
  assert.equal(relisted.kind === 'listing' && names(relisted.view).includes('new'), true);
});

test('removing the current directory moves up to its parent', async () => {
  const { navigation, remote, cache } = setup();
  await navigation.list(alice);
  await navigation.list(alice, 1);

  assert.equal(await navigation.remove(alice, '/docs'), '/docs');
  assert.equal(remote.has('/docs/report.txt'), false);
  assert.deepEqual(cache.list(), []);
  const snapshot = navigation.snapshot(alice);
  assert.equal(snapshot.currentPath, '/');
  assert.equal(snapshot.view, null);

  await assert.rejects(navigation.remove(alice, '/'), InvalidTargetError);
});

test('info reports metadata and a link for files only', async () => {
  const { navigation } = setup();

  const file = await navigation.info(alice, 'notes.txt');
  assert.equal(file.entry.provider, 'memory');
  assert.equal(file.url, 'https://files.test/d/notes.txt');

  const dir = await navigation.info(alice, '/docs');
  assert.equal(dir.entry.kind, 'directory');
  assert.equal(dir.url, undefined);
});
