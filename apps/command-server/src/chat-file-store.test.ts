import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { InvalidTargetError } from '@chatdrive/session-core';
import { DirectoryChatFileStore, isTempFileName, scopeDirName, tempFileName } from './chat-file-store.js';

function tempDir(t: { after: (fn: () => void) => void }): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatdrive-files-'));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  return dir;
}

test('files written into a scope are listed with their folders', async (t) => {
  const store = new DirectoryChatFileStore(tempDir(t));
  await store.putFile('g1', '', 'b.txt', new TextEncoder().encode('bee'));
  await store.putFile('g1', 'docs/2024', 'a.txt', new TextEncoder().encode('a'));
  await store.putFile('g2', '', 'other.txt', new TextEncoder().encode('x'));

  const files = await store.listFiles('g1');
  assert.deepEqual(
    files.map((f) => [f.folder, f.name, f.size]),
    [
      ['', 'b.txt', 3],
      ['docs/2024', 'a.txt', 1],
    ]
  );
  const first = files[0];
  assert.ok(first);
  assert.equal(new TextDecoder().decode(await first.read()), 'bee');
});

test('an unknown scope lists nothing', async (t) => {
  const store = new DirectoryChatFileStore(tempDir(t));
  assert.deepEqual(await store.listFiles('nobody'), []);
});

test('exists reflects written files only', async (t) => {
  const store = new DirectoryChatFileStore(tempDir(t));
  await store.putFile('g1', 'docs', 'a.txt', new Uint8Array([1]));
  assert.equal(await store.exists('g1', 'docs', 'a.txt'), true);
  assert.equal(await store.exists('g1', '', 'a.txt'), false);
  assert.equal(await store.exists('g1', '', 'docs'), false);
});

test('path traversal in folders or names is refused', async (t) => {
  const root = tempDir(t);
  const store = new DirectoryChatFileStore(root);
  await assert.rejects(store.putFile('g1', '../escape', 'a.txt', new Uint8Array()), InvalidTargetError);
  await assert.rejects(store.putFile('g1', '', '..', new Uint8Array()), InvalidTargetError);
  await assert.rejects(store.putFile('g1', '', '../x', new Uint8Array()), InvalidTargetError);
  await assert.rejects(store.putFile('g1', 'docs', 'sub/x.txt', new Uint8Array()), InvalidTargetError);
  await assert.rejects(store.exists('g1', '', '../x'), InvalidTargetError);
  assert.deepEqual(fs.readdirSync(root), []);
});

test('files named like temp files are still listed; in-progress writes are not', async (t) => {
  const root = tempDir(t);
  const store = new DirectoryChatFileStore(root);
  await store.putFile('g1', '', 'draft.tmp', new TextEncoder().encode('draft'));
  fs.writeFileSync(path.join(root, 'g1', tempFileName('half.txt')), 'partial');

  const files = await store.listFiles('g1');
  assert.deepEqual(
    files.map((f) => f.name),
    ['draft.tmp']
  );
  assert.equal(fs.readdirSync(path.join(root, 'g1')).length, 2);
});

test('temp file names are hidden and recognisable', () => {
  const name = tempFileName('report.pdf');
  assert.match(name, /^\.report\.pdf\.[0-9a-f]{8}\.chatdrive-tmp$/);
  assert.equal(isTempFileName(name), true);
  assert.equal(isTempFileName('draft.tmp'), false);
  assert.equal(isTempFileName('notes.chatdrive-tmp'), false);
});

test('scope ids outside the safe alphabet are hashed into a directory name', () => {
  assert.equal(scopeDirName('group-42_a'), 'group-42_a');
  const hashed = scopeDirName('../weird scope');
  assert.match(hashed, /^s_[0-9a-f]{24}$/);
  assert.equal(scopeDirName('../weird scope'), hashed);
});
