import {
  AuthError,
  ConnectionError,
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

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface OpenListClientOptions {
  /** Defaults to the global `fetch`. */
  readonly fetch?: FetchLike;
  readonly timeoutMs?: number;
  readonly searchLimit?: number;
  readonly logger?: Logger;
}

interface Envelope {
  readonly code: number;
  readonly message: string;
  readonly data: unknown;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_SEARCH_LIMIT = 1_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

function numberField(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Percent-encodes each path segment, keeping the separators. */
export function encodeRemotePath(remotePath: string): string {
  return normalizeRemotePath(remotePath)
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

function toEntry(raw: unknown, parent: string): Entry | null {
  if (!isRecord(raw)) return null;
  const name = stringField(raw, 'name');
  if (name.length === 0) return null;
  return {
    name,
    kind: raw['is_dir'] === true ? 'directory' : 'file',
    size: numberField(raw, 'size'),
    modifiedAt: stringField(raw, 'modified'),
    path: joinRemotePath(parent, name),
  };
}

function contentOf(data: unknown): unknown[] {
  if (!isRecord(data)) return [];
  const content = data['content'];
  return Array.isArray(content) ? content : [];
}

/** Maps an envelope or HTTP status code to the core error taxonomy. */
export function toRemoteError(code: number, message: string, remotePath?: string): Error {
  if (code === 401 || code === 403) return new AuthError(message);
  if (code === 404 || /not found/i.test(message)) return new NotFoundError(remotePath ?? message);
  return new RemoteServiceError(message, code);
}

/**
 * OpenList (AList-compatible) HTTP API client. Tokens obtained by logging in
 * are cached per server and user, and refreshed once when the server rejects them.
 */
export class OpenListClient implements RemoteFileService {
  private readonly fetchImpl: FetchLike | undefined;
  private readonly timeoutMs: number;
  private readonly searchLimit: number;
  private readonly logger: Logger;
  private readonly tokens = new Map<string, Promise<string>>();

  public constructor(options: OpenListClientOptions = {}) {
    this.fetchImpl = options.fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.searchLimit = options.searchLimit ?? DEFAULT_SEARCH_LIMIT;
    this.logger = options.logger ?? noopLogger;
  }

  public async list(path: string, credentials: RemoteCredentials): Promise<readonly Entry[]> {
    const target = normalizeRemotePath(path);
    const data = await this.call(credentials, '/api/fs/list', target, {
      path: target,
      password: '',
      page: 1,
      per_page: 0,
      refresh: false,
    });
    return contentOf(data)
      .map((raw) => toEntry(raw, target))
      .filter((entry): entry is Entry => entry !== null);
  }

  public async info(path: string, credentials: RemoteCredentials): Promise<EntryDetail> {
    const target = normalizeRemotePath(path);
    const data = await this.call(credentials, '/api/fs/get', target, { path: target, password: '' });
    if (!isRecord(data)) throw new RemoteServiceError(`Malformed metadata for ${target}`, null);
    const sign = stringField(data, 'sign');
    const rawUrl = stringField(data, 'raw_url');
    const provider = stringField(data, 'provider');
    return {
      name: stringField(data, 'name') || remoteBaseName(target),
      kind: data['is_dir'] === true ? 'directory' : 'file',
      size: numberField(data, 'size'),
      modifiedAt: stringField(data, 'modified'),
      path: target,
      sign: sign || undefined,
      rawUrl: rawUrl || undefined,
      provider: provider || undefined,
    };
  }

  /** `<public url>/d<base directory + path>`, signed when the server signs links. */
  public async link(path: string, credentials: RemoteCredentials): Promise<string> {
    const detail = await this.info(path, credentials);
    if (detail.kind === 'directory') throw new InvalidTargetError(`${detail.path} is a directory`);
    const base = trimSlashes(credentials.publicUrl || credentials.serverUrl);
    const url = `${base}/d${encodeRemotePath(joinRemotePath(credentials.baseDirectory, detail.path))}`;
    if (!detail.sign) {
      this.logger.warn('openlist_link_unsigned', { path: detail.path });
      return url;
    }
    return `${url}?sign=${encodeURIComponent(detail.sign)}`;
  }

  public async search(term: string, path: string, credentials: RemoteCredentials): Promise<readonly Entry[]> {
    const parent = normalizeRemotePath(path);
    const data = await this.call(credentials, '/api/fs/search', parent, {
      parent,
      keywords: term,
      scope: 0,
      page: 1,
      per_page: this.searchLimit,
    });
    const entries: Entry[] = [];
    for (const raw of contentOf(data)) {
      if (!isRecord(raw)) continue;
      const entry = toEntry(raw, stringField(raw, 'parent') || parent);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  public async upload(
    directory: string,
    name: string,
    content: Uint8Array,
    credentials: RemoteCredentials
  ): Promise<void> {
    const target = joinRemotePath(directory, name);
    await this.withToken(credentials, async (token) => {
      const response = await this.send(credentials, '/api/fs/put', {
        method: 'PUT',
        headers: {
          ...this.authHeaders(token),
          'Content-Type': 'application/octet-stream',
          'File-Path': encodeRemotePath(target),
        },
        body: content,
      });
      return this.unwrap(response, target);
    });
  }

  public async read(path: string, credentials: RemoteCredentials): Promise<Uint8Array> {
    const detail = await this.info(path, credentials);
    if (detail.kind === 'directory') throw new InvalidTargetError(`${detail.path} is a directory`);
    const url = detail.rawUrl ?? (await this.link(detail.path, credentials));
    let response: Response;
    try {
      response = await this.doFetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new ConnectionError(`Download of ${detail.path} failed: ${errorMessage(err)}`, err);
    }
    if (!response.ok) {
      throw toRemoteError(response.status, `Download of ${detail.path} failed: HTTP ${response.status}`, detail.path);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  public async delete(path: string, credentials: RemoteCredentials): Promise<void> {
    const target = normalizeRemotePath(path);
    await this.call(credentials, '/api/fs/remove', target, {
      dir: parentRemotePath(target),
      names: [remoteBaseName(target)],
    });
  }

  /** An existing directory (code 405) counts as created. */
  public async mkdir(path: string, credentials: RemoteCredentials): Promise<void> {
    const target = normalizeRemotePath(path);
    try {
      await this.call(credentials, '/api/fs/mkdir', target, { path: target });
    } catch (err) {
      if (err instanceof RemoteServiceError && err.remoteCode === 405) return;
      throw err;
    }
  }

  /** Drops cached login tokens, e.g. after credentials change. */
  public forget(credentials?: RemoteCredentials): void {
    if (credentials) {
      this.tokens.delete(this.tokenKey(credentials));
    } else {
      this.tokens.clear();
    }
  }

  private async call(
    credentials: RemoteCredentials,
    endpoint: string,
    remotePath: string,
    body: Record<string, unknown>
  ): Promise<unknown> {
    return this.withToken(credentials, async (token) => {
      const response = await this.send(credentials, endpoint, {
        method: 'POST',
        headers: { ...this.authHeaders(token), 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
      return this.unwrap(response, remotePath);
    });
  }

  /** Runs `fn` with the session token; a rejected login token is refreshed once. */
  private async withToken<T>(credentials: RemoteCredentials, fn: (token: string) => Promise<T>): Promise<T> {
    if (credentials.token.length > 0 || credentials.username.length === 0 || credentials.password.length === 0) {
      return fn(credentials.token);
    }
    const token = await this.loginToken(credentials);
    try {
      return await fn(token);
    } catch (err) {
      if (!(err instanceof AuthError)) throw err;
      this.tokens.delete(this.tokenKey(credentials));
      return fn(await this.loginToken(credentials));
    }
  }

  private loginToken(credentials: RemoteCredentials): Promise<string> {
    const key = this.tokenKey(credentials);
    const cached = this.tokens.get(key);
    if (cached) return cached;
    const pending = this.login(credentials);
    this.tokens.set(key, pending);
    void pending.catch(() => {
      if (this.tokens.get(key) === pending) this.tokens.delete(key);
    });
    return pending;
  }

  private async login(credentials: RemoteCredentials): Promise<string> {
    const response = await this.send(credentials, '/api/auth/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: credentials.username, password: credentials.password }),
    });
    let data: unknown;
    try {
      data = await this.unwrap(response, '/');
    } catch (err) {
      throw new AuthError(`Login failed for ${credentials.username}: ${errorMessage(err)}`, err);
    }
    const token = isRecord(data) ? stringField(data, 'token') : '';
    if (token.length === 0) throw new AuthError(`Login for ${credentials.username} returned no token`);
    this.logger.info('openlist_login_succeeded', { serverUrl: credentials.serverUrl, username: credentials.username });
    return token;
  }

  private async send(credentials: RemoteCredentials, endpoint: string, init: RequestInit): Promise<Response> {
    const url = `${trimSlashes(credentials.serverUrl)}${endpoint}`;
    try {
      return await this.doFetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new ConnectionError(`Cannot reach ${credentials.serverUrl}: ${errorMessage(err)}`, err);
    }
  }

  private async unwrap(response: Response, remotePath: string): Promise<unknown> {
    if (response.status !== 200) {
      const text = await response.text().catch(() => '');
      throw toRemoteError(response.status, text || `HTTP ${response.status}`, remotePath);
    }
    const envelope = this.parseEnvelope(await response.json().catch(() => null));
    if (envelope.code !== 200) {
      throw toRemoteError(envelope.code, envelope.message, remotePath);
    }
    return envelope.data;
  }

  private parseEnvelope(payload: unknown): Envelope {
    if (!isRecord(payload) || typeof payload['code'] !== 'number') {
      throw new RemoteServiceError('Malformed response from the file server', null);
    }
    return { code: payload['code'], message: stringField(payload, 'message'), data: payload['data'] };
  }

  private authHeaders(token: string): Record<string, string> {
    return token.length > 0 ? { Authorization: token } : {};
  }

  private doFetch(url: string, init: RequestInit): Promise<Response> {
    return this.fetchImpl ? this.fetchImpl(url, init) : fetch(url, init);
  }

  private tokenKey(credentials: RemoteCredentials): string {
    return `${trimSlashes(credentials.serverUrl)}\u0000${credentials.username}\u0000${credentials.password}`;
  }
}
