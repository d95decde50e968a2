import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Client, type SFTPWrapper, type Stats } from 'ssh2';
import {
  AuthError,
  ConnectionError,
  credentialIdentity,
  errorMessage,
  InvalidTargetError,
  joinRemotePath,
  noopLogger,
  normalizeRemotePath,
  NotFoundError,
  parentRemotePath,
  remoteBaseName,
  RemoteServiceError,
  type Entry,
  type EntryDetail,
  type Logger,
  type RemoteCredentials,
  type RemoteFileService,
} from '@chatdrive/session-core';
import { encodeRemotePath } from './openlist-client.js';

/** SFTP status code for a missing path. */
const SFTP_NO_SUCH_FILE = 2;
const DEFAULT_SEARCH_LIMIT = 1_000;

export interface SftpTarget {
  readonly host: string;
  readonly port: number;
  readonly username: string;
}

/** `sftp://[user@]host[:port]`; the credentials' username wins over the URL's. */
export function parseSftpUrl(serverUrl: string, username: string): SftpTarget {
  let url: URL;
  try {
    url = new URL(serverUrl);
  } catch {
    throw new ConnectionError(`Invalid server URL: ${serverUrl}`);
  }
  if (url.protocol !== 'sftp:') throw new ConnectionError(`Not an sftp:// URL: ${serverUrl}`);
  const user = username || decodeURIComponent(url.username);
  if (user.length === 0) throw new AuthError('An SFTP username is required');
  return { host: url.hostname, port: url.port ? Number(url.port) : 22, username: user };
}

/** Base64 host keys listed for `host:port` in known_hosts content. */
export function matchKnownHosts(content: string, hostName: string, port: number): Set<string> {
  const keys = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const parts = trimmed.split(/\s+/);
    const offset = parts[0]?.startsWith('@') ? 1 : 0;
    const hostsField = parts[offset];
    const keyBase64 = parts[offset + 2];
    if (!hostsField || !keyBase64) continue;
    const matches = hostsField.split(',').some((h) => {
      const ht = h.trim();
      if (ht.startsWith('[')) {
        const close = ht.indexOf(']');
        if (close <= 0) return false;
        const portPart = ht.slice(close + 1);
        if (!portPart.startsWith(':')) return false;
        return ht.slice(1, close) === hostName && Number(portPart.slice(1)) === port;
      }
      return port === 22 && ht === hostName;
    });
    if (matches) keys.add(keyBase64);
  }
  return keys;
}

/** Resolves a `~/.ssh` key path; keys elsewhere are refused. */
export function resolveKeyPath(keyPath: string, homeDir: string = os.homedir()): string {
  const expanded = keyPath.startsWith('~/') ? path.join(homeDir, keyPath.slice(2)) : keyPath;
  const sshDir = path.join(homeDir, '.ssh');
  const normalized = path.resolve(expanded);
  if (!normalized.startsWith(sshDir + path.sep)) {
    throw new AuthError(`SSH key path must be under ~/.ssh/, got "${keyPath}"`);
  }
  return normalized;
}

function toRemoteError(err: unknown, remotePath: string): Error {
  if (err instanceof Error && 'code' in err && err.code === SFTP_NO_SUCH_FILE) {
    return new NotFoundError(remotePath);
  }
  return new RemoteServiceError(`SFTP ${remotePath}: ${errorMessage(err)}`, null);
}

function toEntry(remotePath: string, stats: Stats): Entry {
  return {
    name: remoteBaseName(remotePath),
    kind: stats.isDirectory() ? 'directory' : 'file',
    size: stats.isDirectory() ? 0 : stats.size,
    modifiedAt: new Date(stats.mtime * 1000).toISOString(),
    path: remotePath,
  };
}

interface CachedSession {
  readonly sftp: SFTPWrapper;
  readonly client: Client;
}

export interface SftpFileServiceOptions {
  readonly knownHostsPath?: string;
  readonly readyTimeoutMs?: number;
  readonly searchLimit?: number;
  readonly logger?: Logger;
}

/**
 * RemoteFileService over SFTP. One session is kept per credential identity;
 * hosts must be listed in known_hosts. The credentials' `password` is used as
 * the SSH password, otherwise `token` names a private key under ~/.ssh.
 */
export class SftpFileService implements RemoteFileService {
  private readonly sessions = new Map<string, Promise<CachedSession>>();
  private readonly knownHostsPath: string;
  private readonly readyTimeoutMs: number;
  private readonly searchLimit: number;
  private readonly logger: Logger;

  public constructor(options: SftpFileServiceOptions = {}) {
    this.knownHostsPath = options.knownHostsPath ?? path.join(os.homedir(), '.ssh', 'known_hosts');
    this.readyTimeoutMs = options.readyTimeoutMs ?? 15_000;
    this.searchLimit = options.searchLimit ?? DEFAULT_SEARCH_LIMIT;
    this.logger = options.logger ?? noopLogger;
  }

  public async list(remotePath: string, credentials: RemoteCredentials): Promise<readonly Entry[]> {
    const dir = normalizeRemotePath(remotePath);
    const sftp = await this.getSftp(credentials);
    const items = await new Promise<{ filename: string; attrs: Stats }[]>((resolve, reject) => {
      sftp.readdir(dir, (err, list) => (err ? reject(toRemoteError(err, dir)) : resolve(list)));
    });
    return items
      .filter((item) => item.filename !== '.' && item.filename !== '..')
      .map((item) => toEntry(joinRemotePath(dir, item.filename), item.attrs));
  }

  public async info(remotePath: string, credentials: RemoteCredentials): Promise<EntryDetail> {
    const target = normalizeRemotePath(remotePath);
    const stats = await this.stat(await this.getSftp(credentials), target);
    return { ...toEntry(target, stats), provider: 'sftp' };
  }

  public async link(remotePath: string, credentials: RemoteCredentials): Promise<string> {
    const detail = await this.info(remotePath, credentials);
    if (detail.kind === 'directory') throw new InvalidTargetError(`${detail.path} is a directory`);
    const base = (credentials.publicUrl || credentials.serverUrl).replace(/\/+$/, '');
    return `${base}${encodeRemotePath(joinRemotePath(credentials.baseDirectory, detail.path))}`;
  }

  /** Breadth-first name match below `remotePath`, bounded by the search limit. */
  public async search(term: string, remotePath: string, credentials: RemoteCredentials): Promise<readonly Entry[]> {
    const needle = term.toLowerCase();
    const results: Entry[] = [];
    const queue = [normalizeRemotePath(remotePath)];
    while (queue.length > 0 && results.length < this.searchLimit) {
      const dir = queue.shift();
      if (dir === undefined) break;
      for (const entry of await this.list(dir, credentials)) {
        if (entry.kind === 'directory') queue.push(entry.path);
        if (entry.name.toLowerCase().includes(needle)) results.push(entry);
        if (results.length >= this.searchLimit) break;
      }
    }
    return results;
  }

  public async upload(
    directory: string,
    name: string,
    content: Uint8Array,
    credentials: RemoteCredentials
  ): Promise<void> {
    const target = joinRemotePath(directory, name);
    const sftp = await this.getSftp(credentials);
    await new Promise<void>((resolve, reject) => {
      sftp.writeFile(target, Buffer.from(content), (err) => (err ? reject(toRemoteError(err, target)) : resolve()));
    });
  }

  public async read(remotePath: string, credentials: RemoteCredentials): Promise<Uint8Array> {
    const target = normalizeRemotePath(remotePath);
    const sftp = await this.getSftp(credentials);
    const buffer = await new Promise<Buffer>((resolve, reject) => {
      sftp.readFile(target, (err, data) => (err ? reject(toRemoteError(err, target)) : resolve(data)));
    });
    return new Uint8Array(buffer);
  }

  public async delete(remotePath: string, credentials: RemoteCredentials): Promise<void> {
    const target = normalizeRemotePath(remotePath);
    const sftp = await this.getSftp(credentials);
    const stats = await this.stat(sftp, target);
    if (!stats.isDirectory()) {
      await new Promise<void>((resolve, reject) => {
        sftp.unlink(target, (err) => (err ? reject(toRemoteError(err, target)) : resolve()));
      });
      return;
    }
    for (const child of await this.list(target, credentials)) {
      await this.delete(child.path, credentials);
    }
    await new Promise<void>((resolve, reject) => {
      sftp.rmdir(target, (err) => (err ? reject(toRemoteError(err, target)) : resolve()));
    });
  }

  /** Creates `remotePath` and any missing parents. */
  public async mkdir(remotePath: string, credentials: RemoteCredentials): Promise<void> {
    const target = normalizeRemotePath(remotePath);
    if (target === '/') return;
    const sftp = await this.getSftp(credentials);
    try {
      const stats = await this.stat(sftp, target);
      if (stats.isDirectory()) return;
      throw new RemoteServiceError(`${target} exists and is a file`, null);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }
    await this.mkdir(parentRemotePath(target), credentials);
    await new Promise<void>((resolve, reject) => {
      sftp.mkdir(target, (err) => (err ? reject(toRemoteError(err, target)) : resolve()));
    });
  }

  public closeAll(): void {
    for (const pending of this.sessions.values()) {
      void pending.then(
        (session) => session.client.end(),
        () => undefined
      );
    }
    this.sessions.clear();
  }

  private stat(sftp: SFTPWrapper, target: string): Promise<Stats> {
    return new Promise<Stats>((resolve, reject) => {
      sftp.stat(target, (err, stats) => (err ? reject(toRemoteError(err, target)) : resolve(stats)));
    });
  }

  private getSftp(credentials: RemoteCredentials): Promise<SFTPWrapper> {
    const key = credentialIdentity(credentials);
    let pending = this.sessions.get(key);
    if (!pending) {
      pending = this.open(key, credentials);
      this.sessions.set(key, pending);
      const opened = pending;
      void opened.catch(() => {
        if (this.sessions.get(key) === opened) this.sessions.delete(key);
      });
    }
    return pending.then((session) => session.sftp);
  }

  private async open(key: string, credentials: RemoteCredentials): Promise<CachedSession> {
    const target = parseSftpUrl(credentials.serverUrl, credentials.username);
    const expectedKeys = matchKnownHosts(
      await readFile(this.knownHostsPath, 'utf-8').catch(() => ''),
      target.host,
      target.port
    );
    if (expectedKeys.size === 0) {
      throw new AuthError(`Host ${target.host}:${target.port} is not in known_hosts`);
    }

    const auth: { password: string } | { privateKey: Buffer } =
      credentials.password.length > 0
        ? { password: credentials.password }
        : { privateKey: await this.readKey(credentials.token) };

    const client = new Client();
    try {
      await new Promise<void>((resolve, reject) => {
        client.on('ready', resolve);
        client.on('error', reject);
        client.connect({
          host: target.host,
          port: target.port,
          username: target.username,
          ...auth,
          readyTimeout: this.readyTimeoutMs,
          hostVerifier: (hostKey: Buffer): boolean => expectedKeys.has(hostKey.toString('base64')),
        });
      });
    } catch (err) {
      if (/authentication/i.test(errorMessage(err))) {
        throw new AuthError(`SFTP login failed for ${target.username}@${target.host}`, err);
      }
      throw new ConnectionError(`Cannot reach ${target.host}:${target.port}: ${errorMessage(err)}`, err);
    }

    const sftp = await new Promise<SFTPWrapper>((resolve, reject) => {
      client.sftp((err, session) => {
        if (err) {
          client.end();
          reject(new ConnectionError(`SFTP subsystem unavailable on ${target.host}`, err));
          return;
        }
        resolve(session);
      });
    });

    const forget = (): void => {
      this.sessions.delete(key);
    };
    client.on('close', forget);
    client.on('error', (err: Error) => {
      this.logger.warn('sftp_session_error', { host: target.host, message: err.message });
      forget();
    });
    this.logger.info('sftp_session_opened', { host: target.host, port: target.port, username: target.username });
    return { sftp, client };
  }

  private async readKey(keyPath: string): Promise<Buffer> {
    if (keyPath.length === 0) throw new AuthError('Set a password or a ~/.ssh key path for SFTP');
    const resolved = resolveKeyPath(keyPath);
    try {
      return await readFile(resolved);
    } catch (err) {
      throw new AuthError(`Cannot read SSH key: ${keyPath}`, err);
    }
  }
}
