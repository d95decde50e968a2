import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test, { type TestContext } from 'node:test';
import { createChatDrive, SettingsStore, type ChatDrive, type SharedSettings } from '@chatdrive/session-core';
import { FakeRemoteFileService, ManualClock, MemoryChatFileStore } from '@chatdrive/session-core/testing';
import type { FastifyInstance } from 'fastify';
import { DownloadStager } from './download-stager.js';
import { buildServer } from './server.js';

const AUTH = { authorization: 'Bearer test-secret' };

interface Harness {
  readonly app: FastifyInstance;
  readonly drive: ChatDrive;
  readonly remote: FakeRemoteFileService;
  readonly chatFiles: MemoryChatFileStore;
  readonly downloadDir: string;
}

async function setup(
  t: TestContext,
  seed: Partial<SharedSettings> = { requireUserAuth: false, serverUrl: 'https://files.test' }
): Promise<Harness> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatdrive-server-'));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));

  const clock = new ManualClock();
  const remote = new FakeRemoteFileService().addFile('/docs/a.txt', 'alpha').addDirectory('/movies');
  const chatFiles = new MemoryChatFileStore();
  const settings = new SettingsStore(path.join(dir, 'data'), seed);
  const downloadDir = path.join(dir, 'downloads');

  const { app, services } = await buildServer({
    authToken: 'test-secret',
    logger: false,
    services: (logger) => ({
      drive: createChatDrive({ settings, remote, chatFiles, clock, logger }),
      stager: new DownloadStager({ remote, directory: downloadDir, ttlMs: 10_000, clock, logger }),
      settings,
    }),
  });
  t.after(async () => {
    await app.close();
  });
  return { app, drive: services.drive, remote, chatFiles, downloadDir };
}

function command(app: FastifyInstance, userId: string, scope: string, text: string) {
  return app.inject({ method: 'POST', url: '/commands', headers: AUTH, payload: { userId, scope, text } });
}

test('health is open and reports engine counters', async (t) => {
  const { app } = await setup(t);
  const response = await app.inject({ method: 'GET', url: '/health' });
  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { ok: true, sessions: 0, cacheEntries: 0 });
});

test('allowed local origins are reflected by cors', async (t) => {
  const { app } = await setup(t);
  const response = await app.inject({
    method: 'GET',
    url: '/health',
    headers: { origin: 'http://localhost:5173' },
  });
  assert.equal(response.headers['access-control-allow-origin'], 'http://localhost:5173');
});

test('every other route requires the bearer token', async (t) => {
  const { app } = await setup(t);
  const payload = { userId: 'alice', scope: 'private', text: 'ls' };

  for (const authorization of [undefined, 'Bearer wrong', 'Basic test-secret', 'Bearer']) {
    const response = await app.inject({
      method: 'POST',
      url: '/commands',
      headers: authorization === undefined ? {} : { authorization },
      payload,
    });
    assert.equal(response.statusCode, 401);
    assert.deepEqual(response.json(), { error: 'unauthorized' });
  }

  const ok = await command(app, 'alice', 'private', 'ls');
  assert.equal(ok.statusCode, 200);
});

test('commands return the rendered listing', async (t) => {
  const { app } = await setup(t);
  const response = await command(app, 'alice', 'private', '/ls');
  assert.equal(response.statusCode, 200);

  const body = response.json();
  assert.equal(body.kind, 'listing');
  assert.equal(body.view.path, '/');
  assert.deepEqual(
    body.view.page.items.map((item: { name: string }) => item.name),
    ['docs', 'movies']
  );

  const health = await app.inject({ method: 'GET', url: '/health' });
  assert.deepEqual(health.json(), { ok: true, sessions: 1, cacheEntries: 1 });
});

test('engine errors map to status codes with their error code', async (t) => {
  const { app } = await setup(t);

  const unknown = await command(app, 'alice', 'private', 'dance');
  assert.equal(unknown.statusCode, 400);
  assert.deepEqual(unknown.json(), { error: 'invalid_command', message: 'Unknown command: dance' });

  const missing = await command(app, 'alice', 'private', 'info /nope');
  assert.equal(missing.statusCode, 404);
  assert.deepEqual(missing.json(), { error: 'not_found', message: 'Not found: /nope', details: { path: '/nope' } });

  const noListing = await command(app, 'alice', 'private', 'ls 1');
  assert.equal(noListing.statusCode, 400);
  assert.equal(noListing.json().error, 'no_active_listing');
});

test('an unconfigured user gets 412', async (t) => {
  const { app } = await setup(t, {});
  const response = await command(app, 'alice', 'private', 'ls');
  assert.equal(response.statusCode, 412);
  assert.deepEqual(response.json(), {
    error: 'not_configured',
    message: 'No remote server is configured for this user',
  });
});

test('malformed bodies are rejected before reaching the engine', async (t) => {
  const { app } = await setup(t);

  const noText = await app.inject({ method: 'POST', url: '/commands', headers: AUTH, payload: { userId: 'alice' } });
  assert.equal(noText.statusCode, 400);
  assert.equal(noText.json().error, 'invalid_body');

  const badKind = await app.inject({
    method: 'POST',
    url: '/attachments',
    headers: AUTH,
    payload: { userId: 'alice', scope: 'private', name: 'a.txt', kind: 'video', contentBase64: 'aGk=' },
  });
  assert.equal(badKind.statusCode, 400);
  assert.equal(badKind.json().error, 'invalid_body');
});

test('a path download is staged on local disk', async (t) => {
  const { app, downloadDir } = await setup(t);
  const response = await command(app, 'alice', 'private', 'download /docs/a.txt');
  assert.equal(response.statusCode, 200);

  const body = response.json();
  assert.equal(body.kind, 'retrieval');
  assert.equal(body.retrieval.stagingName, 'alice_1700000000_a.txt');
  assert.equal(body.staged.path, path.join(downloadDir, 'alice_1700000000_a.txt'));
  assert.equal(body.staged.size, 5);
  assert.equal(fs.readFileSync(body.staged.path, 'utf8'), 'alpha');
});

test('an attachment sent in upload mode lands in the listed directory', async (t) => {
  const { app, remote } = await setup(t);
  assert.equal((await command(app, 'alice', 'private', 'ls /movies')).statusCode, 200);
  const started = await command(app, 'alice', 'private', 'upload');
  assert.equal(started.json().upload.targetPath, '/movies');

  const response = await app.inject({
    method: 'POST',
    url: '/attachments',
    headers: AUTH,
    payload: {
      userId: 'alice',
      scope: 'private',
      name: 'clip.mp4',
      kind: 'file',
      contentBase64: Buffer.from('data').toString('base64'),
    },
  });
  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { kind: 'uploaded', name: 'clip.mp4', targetPath: '/movies', size: 4 });
  assert.equal(remote.textOf('/movies/clip.mp4'), 'data');
});

test('job routes report status and itemized failures', async (t) => {
  const { app, drive, chatFiles } = await setup(t);
  chatFiles
    .add('g1', '', 'good.txt', 'fine')
    .add('g1', '', 'bad.txt', 'broken')
    .failRead('g1', 'bad.txt', new Error('disk read failed'));

  const unknown = await app.inject({ method: 'GET', url: '/jobs/nope', headers: AUTH });
  assert.equal(unknown.statusCode, 404);
  assert.deepEqual(unknown.json(), { error: 'job_not_found', message: 'Unknown job: nope', details: { jobId: 'nope' } });

  const started = await command(app, 'bob', 'g1', 'backup /saved');
  assert.equal(started.statusCode, 200);
  const jobId: string = started.json().job.id;
  await drive.jobs.waitForJob(jobId);

  const status = await app.inject({ method: 'GET', url: `/jobs/${jobId}`, headers: AUTH });
  assert.equal(status.statusCode, 200);
  const body = status.json();
  assert.equal(body.job.status, 'partial');
  assert.equal(body.job.destination, '/saved');
  assert.deepEqual(body.failure, {
    message: `1 of 2 item(s) failed in job ${jobId}`,
    failures: [{ name: 'bad.txt', source: 'bad.txt', reason: 'disk read failed' }],
  });

  const cancel = await app.inject({ method: 'POST', url: `/jobs/${jobId}/cancel`, headers: AUTH });
  assert.deepEqual(cancel.json(), { jobId, cancelled: false });
});
