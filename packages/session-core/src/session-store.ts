import { systemClock, type Clock } from './clock.js';
import { KeyedLock } from './lock.js';
import type { Entry } from './types.js';

export interface SessionIdentity {
  readonly userId: string;
  /** Chat scope: a group/channel id, or 'private' for direct messages. */
  readonly scope: string;
}

export type SessionMode = 'idle' | 'browsing' | 'searching' | 'uploading';

export interface ListingView {
  readonly source: 'listing' | 'search';
  /** Listed directory, or the search root for search views. */
  readonly path: string;
  readonly term?: string | undefined;
  /** Sorted, in rendered order. */
  readonly entries: readonly Entry[];
  readonly pageIndex: number;
  readonly pageSize: number;
  /** Increments on every new view so stale references can be told apart. */
  readonly generation: number;
  readonly fetchedAt: number;
  readonly fromCache: boolean;
}

export interface UploadSession {
  readonly id: string;
  readonly sessionKey: string;
  readonly targetPath: string;
  readonly createdAt: number;
  readonly deadline: number;
  readonly state: 'active' | 'cancelled' | 'expired' | 'consumed';
}

export interface SessionState {
  readonly key: string;
  readonly identity: SessionIdentity;
  readonly currentPath: string;
  /** Previously visited paths; `quit` pops the last one. */
  readonly navStack: readonly string[];
  readonly view: ListingView | null;
  readonly upload: UploadSession | null;
  readonly viewGeneration: number;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface Transition<T> {
  readonly state: SessionState;
  readonly result: T;
}

export type SessionMutator<T> = (
  current: SessionState
) => Transition<T> | Promise<Transition<T>>;

/** Escapes `%` and `:` so a key always holds exactly one bare separator. */
export function sessionKeyPart(value: string): string {
  return value.replace(/%/g, '%25').replace(/:/g, '%3A');
}

export function sessionKey(identity: SessionIdentity): string {
  return `${sessionKeyPart(identity.scope)}:${sessionKeyPart(identity.userId)}`;
}

export function activeMode(state: SessionState): SessionMode {
  if (state.upload?.state === 'active') return 'uploading';
  if (!state.view) return 'idle';
  return state.view.source === 'search' ? 'searching' : 'browsing';
}

export interface SessionStoreOptions {
  readonly clock?: Clock;
  readonly rootPath?: string;
}

/**
 * Keyed session map. Every mutation of one session runs under that session's
 * lock and commits only when the mutator resolves.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly locks = new KeyedLock();
  private readonly clock: Clock;
  private readonly rootPath: string;

  public constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.rootPath = options.rootPath ?? '/';
  }

  public getOrCreate(identity: SessionIdentity): SessionState {
    const key = sessionKey(identity);
    const existing = this.sessions.get(key);
    if (existing) return existing;
    const now = this.clock.now();
    const created: SessionState = {
      key,
      identity: { userId: identity.userId, scope: identity.scope },
      currentPath: this.rootPath,
      navStack: [],
      view: null,
      upload: null,
      viewGeneration: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(key, created);
    return created;
  }

  public peek(identity: SessionIdentity): SessionState | null {
    return this.sessions.get(sessionKey(identity)) ?? null;
  }

  public async update<T>(identity: SessionIdentity, mutator: SessionMutator<T>): Promise<T> {
    const key = sessionKey(identity);
    return this.locks.run(key, async () => {
      const current = this.getOrCreate(identity);
      const { state, result } = await mutator(current);
      if (state !== current) {
        this.sessions.set(key, { ...state, key, updatedAt: this.clock.now() });
      }
      return result;
    });
  }

  /** Runs `fn` under the session lock without changing state. */
  public async read<T>(identity: SessionIdentity, fn: (current: SessionState) => T | Promise<T>): Promise<T> {
    return this.update(identity, async (current) => ({ state: current, result: await fn(current) }));
  }

  public async reset(identity: SessionIdentity): Promise<boolean> {
    const key = sessionKey(identity);
    return this.locks.run(key, () => this.sessions.delete(key));
  }

  public list(): readonly SessionState[] {
    return [...this.sessions.values()];
  }

  public get size(): number {
    return this.sessions.size;
  }
}

/** Replaces the session's view with a fresh one on page 0. */
export function withView(
  state: SessionState,
  view: Omit<ListingView, 'generation' | 'pageIndex'>
): SessionState {
  const generation = state.viewGeneration + 1;
  return {
    ...state,
    view: { ...view, pageIndex: 0, generation },
    viewGeneration: generation,
  };
}
