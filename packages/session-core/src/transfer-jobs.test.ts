import assert from 'node:assert/strict';
import test from 'node:test';
import { JobInProgressError, JobNotFoundError } from './errors.js';
import { ListingCache } from './listing-cache.js';
import { sessionKey, type SessionIdentity } from './session-store.js';
import type { AutoBackupRule, Profile } from './settings-store.js';
import { TaskRegistry } from './task-registry.js';
import { FakeRemoteFileService } from './testing/fake-remote.js';
import { flushAsync, ManualClock } from './testing/manual-clock.js';
import { MemoryChatFileStore } from './testing/memory-chat-files.js';
import { staticProfiles, testProfile } from './testing/profiles.js';
import {
  autoBackupSessionKey,
  mapWithConcurrency,
  toPartialFailure,
  TransferJobEngine,
  type JobEvent,
} from './transfer-jobs.js';

const alice: SessionIdentity = { userId: 'alice', scope: 'g1' };

function setup(profile: Profile = testProfile(), rules: AutoBackupRule[] = []) {
  const clock = new ManualClock();
  const remote = new FakeRemoteFileService();
  const chatFiles = new MemoryChatFileStore();
  const cache = new ListingCache({ clock });
  const events: JobEvent[] = [];
  const jobs = new TransferJobEngine({
    chatFiles,
    remote,
    cache,
    profiles: staticProfiles(profile),
    tasks: new TaskRegistry(),
    autoBackups: { listAutoBackups: () => rules },
    clock,
    onJobEvent: (event) => events.push(event),
  });
  return { remote, chatFiles, cache, jobs, events };
}

test('one failing item makes the job partial and the rest still transfer', async () => {
  const { remote, chatFiles, jobs, events } = setup();
  for (let i = 1; i <= 5; i++) chatFiles.add('g1', '', `f${i}.txt`, `data-${i}`);
  chatFiles.failRead('g1', 'f3.txt', new Error('disk read failed'));

  const started = jobs.startBackup(alice);
  assert.equal(started.destination, '/backup/g1');
  assert.equal(started.source, '@g1');
  const job = await jobs.waitForJob(started.id);

  assert.equal(job.status, 'partial');
  assert.deepEqual(
    job.items.map((item) => item.status),
    ['transferred', 'transferred', 'failed', 'transferred', 'transferred']
  );
  assert.equal(job.items[2]?.error, 'disk read failed');
  assert.equal(remote.textOf('/backup/g1/f5.txt'), 'data-5');
  assert.equal(remote.has('/backup/g1/f3.txt'), false);
  assert.equal(toPartialFailure(job)?.message, `1 of 5 item(s) failed in job ${job.id}`);
  assert.deepEqual(
    events.map((e) => e.kind),
    ['job:started', 'job:finished']
  );
});

test('a rerun skips files already present unless forced', async () => {
  const { remote, chatFiles, jobs } = setup();
  chatFiles.add('g1', '', 'a.txt', 'one').add('g1', 'photos', 'b.png', 'two');

  const first = await jobs.waitForJob(jobs.startBackup(alice).id);
  assert.equal(first.status, 'complete');
  assert.deepEqual(
    first.items.map((item) => item.destination),
    ['/backup/g1/a.txt', '/backup/g1/photos/b.png']
  );

  chatFiles.add('g1', '', 'a.txt', 'changed');
  const second = await jobs.waitForJob(jobs.startBackup(alice).id);
  assert.deepEqual(
    second.items.map((item) => item.status),
    ['skipped', 'skipped']
  );
  assert.equal(remote.textOf('/backup/g1/a.txt'), 'one');

  const forced = await jobs.waitForJob(jobs.startBackup(alice, { force: true }).id);
  assert.deepEqual(
    forced.items.map((item) => item.status),
    ['transferred', 'transferred']
  );
  assert.equal(remote.textOf('/backup/g1/a.txt'), 'changed');
  assert.throws(() => jobs.getJob(first.id), JobNotFoundError);
});

test('a second job for the same session is refused while one runs', async () => {
  const { remote, chatFiles, jobs } = setup();
  chatFiles.add('g1', '', 'a.txt', 'one');
  const release = remote.pauseLists();

  const running = jobs.startBackup(alice);
  assert.throws(() => jobs.startBackup(alice), JobInProgressError);
  assert.equal(jobs.listJobs('g1:alice').length, 1);

  release();
  assert.equal((await jobs.waitForJob(running.id)).status, 'complete');
});

test('cancelling stops scheduling further items', async () => {
  const { remote, chatFiles, jobs } = setup(testProfile({ transferConcurrency: 1 }));
  chatFiles.add('g1', '', 'a.txt', '1').add('g1', '', 'b.txt', '2').add('g1', '', 'c.txt', '3');
  const release = remote.pauseLists();

  const started = jobs.startBackup(alice);
  await flushAsync();
  assert.equal(jobs.cancelJob(started.id), true);
  release();

  const job = await jobs.waitForJob(started.id);
  assert.equal(job.status, 'cancelled');
  assert.deepEqual(
    job.items.map((item) => item.status),
    ['transferred', 'pending', 'pending']
  );
  assert.equal(jobs.cancelJob(started.id), false);
});

test('restore copies a remote tree into the chat and skips existing files', async () => {
  const { remote, chatFiles, jobs } = setup();
  remote.addFile('/backup/g1/a.txt', 'alpha').addFile('/backup/g1/docs/b.txt', 'beta');
  chatFiles.add('g1', 'docs', 'b.txt', 'local');

  const job = await jobs.waitForJob(jobs.startRestore(alice, { source: '/backup/g1' }).id);

  assert.equal(job.status, 'complete');
  assert.equal(job.destination, '@g1');
  assert.deepEqual(
    job.items.map((item) => [item.destination, item.status]),
    [
      ['a.txt', 'transferred'],
      ['docs/b.txt', 'skipped'],
    ]
  );
  assert.equal(chatFiles.textOf('g1', '', 'a.txt'), 'alpha');
  assert.equal(chatFiles.textOf('g1', 'docs', 'b.txt'), 'local');
});

test('a restore whose source is missing fails as a whole', async () => {
  const { jobs } = setup();

  const job = await jobs.waitForJob(jobs.startRestore(alice, { source: '/nope' }).id);

  assert.equal(job.status, 'failed');
  assert.equal(job.error, 'Not found: /nope');
  assert.deepEqual(job.items, []);
});

test('jobs are truncated at the item limit', async () => {
  const { chatFiles, jobs } = setup(testProfile({ maxJobItems: 2 }));
  chatFiles.add('g1', '', 'a.txt', '1').add('g1', '', 'b.txt', '2').add('g1', '', 'c.txt', '3');

  const job = await jobs.waitForJob(jobs.startBackup(alice).id);

  assert.equal(job.truncated, true);
  assert.equal(job.items.length, 2);
});

test('autobackup runs enabled rules once at a time with their own session key', async () => {
  const rules: AutoBackupRule[] = [
    { scope: 'g2', destination: '/auto/g2', enabled: true, ownerUserId: 'bob', updatedAt: '2024-01-01T00:00:00Z' },
    { scope: 'g3', destination: '/auto/g3', enabled: false, ownerUserId: 'bob', updatedAt: '2024-01-01T00:00:00Z' },
  ];
  const { remote, chatFiles, jobs } = setup(testProfile(), rules);
  chatFiles.add('g2', '', 'x.txt', 'auto');

  const started = jobs.runAutoBackups();
  assert.equal(started.length, 1);
  assert.equal(started[0]?.sessionKey, 'auto::g2');
  assert.deepEqual(jobs.runAutoBackups(), []);

  const id = started[0]?.id ?? '';
  assert.equal((await jobs.waitForJob(id)).status, 'complete');
  assert.equal(remote.textOf('/auto/g2/x.txt'), 'auto');
});

test('autobackup session keys never match a chat user key', () => {
  assert.equal(autoBackupSessionKey('g2'), 'auto::g2');
  assert.notEqual(autoBackupSessionKey('g2'), sessionKey({ scope: 'auto', userId: 'g2' }));
  assert.equal(autoBackupSessionKey('a:b'), 'auto::a%3Ab');
  assert.notEqual(autoBackupSessionKey(''), sessionKey({ scope: 'auto', userId: ':' }));
});

test('mapWithConcurrency keeps at most the limit in flight', async () => {
  let inFlight = 0;
  let maxInFlight = 0;
  const seen: number[] = [];

  await mapWithConcurrency([1, 2, 3, 4, 5], 2, async (n) => {
    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    await new Promise<void>((resolve) => setImmediate(resolve));
    seen.push(n);
    inFlight--;
  });

  assert.equal(maxInFlight, 2);
  assert.deepEqual(
    [...seen].sort((a, b) => a - b),
    [1, 2, 3, 4, 5]
  );
});
