import { systemClock, type Clock } from './clock.js';
import { InvalidTargetError, NoActiveListingError, NoParentError, SizeLimitExceededError } from './errors.js';
import type { ListingCache, ListingResult } from './listing-cache.js';
import { paginate, resolveIndex, sortEntries, stepPage, type Page } from './pagination.js';
import {
  isSameOrDescendant,
  normalizeRemotePath,
  parentRemotePath,
  resolveRemotePath,
} from './paths.js';
import {
  activeMode,
  withView,
  type ListingView,
  type SessionIdentity,
  type SessionMode,
  type SessionState,
  type SessionStore,
} from './session-store.js';
import type { Profile } from './settings-store.js';
import type { Entry, EntryDetail, Logger, RemoteFileService } from './types.js';
import { noopLogger } from './types.js';

export interface ProfileResolver {
  resolveProfile(userId: string): Profile;
}

export interface RenderedView {
  readonly source: ListingView['source'];
  readonly path: string;
  readonly term?: string | undefined;
  readonly generation: number;
  readonly fromCache: boolean;
  readonly fetchedAt: number;
  readonly page: Page;
}

export interface LinkDescriptor {
  readonly entry: Entry;
  readonly url: string;
}

/** A file the caller should fetch and hand to the chat user. */
export interface RetrievalDescriptor {
  readonly entry: Entry;
  readonly url: string;
  /** Collision-free local file name for staging the download. */
  readonly stagingName: string;
}

export type ListOutcome =
  | { readonly kind: 'listing'; readonly view: RenderedView }
  | { readonly kind: 'link'; readonly link: LinkDescriptor }
  | { readonly kind: 'retrieval'; readonly retrieval: RetrievalDescriptor };

export type DownloadOutcome =
  | { readonly kind: 'link'; readonly link: LinkDescriptor }
  | { readonly kind: 'retrieval'; readonly retrieval: RetrievalDescriptor };

export interface PageMove {
  readonly view: RenderedView;
  readonly boundary: boolean;
}

export interface InfoResult {
  readonly entry: EntryDetail;
  readonly url?: string | undefined;
}

export interface SessionSnapshot {
  readonly key: string;
  readonly mode: SessionMode;
  readonly currentPath: string;
  readonly depth: number;
  readonly view: RenderedView | null;
}

/** `ls` / `rm` / `download` target: a 1-based index on the current page or a path. */
export type EntryTarget = number | string;

export interface NavigationControllerDeps {
  readonly sessions: SessionStore;
  readonly cache: ListingCache;
  readonly remote: RemoteFileService;
  readonly profiles: ProfileResolver;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

const STAGING_NAME_MAX = 100;

function safeFileName(name: string): string {
  return Array.from(name)
    .filter((c) => /[\p{L}\p{N}._\- ]/u.test(c))
    .join('')
    .slice(0, STAGING_NAME_MAX);
}

/** `<userId>_<unix seconds>_<sanitized name>`. */
export function stagingFileName(userId: string, name: string, nowMs: number): string {
  const safeName = safeFileName(name);
  return `${safeFileName(userId)}_${Math.floor(nowMs / 1000)}_${safeName.length > 0 ? safeName : 'file'}`;
}

export function renderView(view: ListingView): RenderedView {
  return {
    source: view.source,
    path: view.path,
    term: view.term,
    generation: view.generation,
    fromCache: view.fromCache,
    fetchedAt: view.fetchedAt,
    page: paginate(view.entries, view.pageSize, view.pageIndex),
  };
}

function requireView(state: SessionState): ListingView {
  if (!state.view) throw new NoActiveListingError();
  return state.view;
}

/**
 * Browse, search and path-level operations for one chat session. Every
 * operation runs under the session lock; state commits only after the
 * remote calls it depends on have succeeded.
 */
export class NavigationController {
  private readonly sessions: SessionStore;
  private readonly cache: ListingCache;
  private readonly remote: RemoteFileService;
  private readonly profiles: ProfileResolver;
  private readonly clock: Clock;
  private readonly logger: Logger;

  public constructor(deps: NavigationControllerDeps) {
    this.sessions = deps.sessions;
    this.cache = deps.cache;
    this.remote = deps.remote;
    this.profiles = deps.profiles;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? noopLogger;
  }

  public async list(identity: SessionIdentity, target?: EntryTarget): Promise<ListOutcome> {
    const profile = this.profiles.resolveProfile(identity.userId);
    return this.sessions.update<ListOutcome>(identity, async (state) => {
      if (target === undefined) {
        const next = await this.showDirectory(state, profile, state.currentPath, 'relist');
        return { state: next, result: this.listingOutcome(next) };
      }

      if (typeof target === 'number') {
        const entry = resolveIndex(requireView(state), target);
        if (entry.kind === 'file') {
          const url = await this.remote.link(entry.path, profile.credentials);
          return { state, result: { kind: 'link', link: { entry, url } } };
        }
        const next = await this.showDirectory(state, profile, entry.path, 'descend');
        return { state: next, result: this.listingOutcome(next) };
      }

      const resolved = resolveRemotePath(state.currentPath, target);
      if (resolved !== '/') {
        const detail = await this.remote.info(resolved, profile.credentials);
        if (detail.kind === 'file') {
          const retrieval = await this.retrieval(identity, detail, profile);
          return { state, result: { kind: 'retrieval', retrieval } };
        }
      }
      const next = await this.showDirectory(state, profile, resolved, 'jump');
      return { state: next, result: this.listingOutcome(next) };
    });
  }

  public async next(identity: SessionIdentity): Promise<PageMove> {
    return this.movePage(identity, 1);
  }

  public async prev(identity: SessionIdentity): Promise<PageMove> {
    return this.movePage(identity, -1);
  }

  /** Returns to the previously visited directory. */
  public async quit(identity: SessionIdentity): Promise<RenderedView> {
    const profile = this.profiles.resolveProfile(identity.userId);
    return this.sessions.update(identity, async (state) => {
      const previous = state.navStack[state.navStack.length - 1];
      if (previous === undefined) throw new NoParentError();
      const popped: SessionState = { ...state, navStack: state.navStack.slice(0, -1) };
      const next = await this.showDirectory(popped, profile, previous, 'jump');
      return { state: next, result: renderView(requireView(next)) };
    });
  }

  /** Uncached remote search rooted at `path` (default: the current path). */
  public async search(identity: SessionIdentity, term: string, path?: string): Promise<RenderedView> {
    const profile = this.profiles.resolveProfile(identity.userId);
    const trimmed = term.trim();
    if (trimmed.length === 0) throw new InvalidTargetError('Search term is empty');
    return this.sessions.update(identity, async (state) => {
      const root = path === undefined ? state.currentPath : resolveRemotePath(state.currentPath, path);
      const results = await this.remote.search(trimmed, root, profile.credentials);
      const next = withView(state, {
        source: 'search',
        path: root,
        term: trimmed,
        entries: sortEntries(results),
        pageSize: profile.pageSize,
        fetchedAt: this.clock.now(),
        fromCache: false,
      });
      this.logger.info('search_completed', {
        sessionKey: state.key,
        path: root,
        results: results.length,
        credentialId: profile.credentialId,
      });
      return { state: next, result: renderView(requireView(next)) };
    });
  }

  /** Direct metadata lookup, never served from the cache. */
  public async info(identity: SessionIdentity, path: string): Promise<InfoResult> {
    const profile = this.profiles.resolveProfile(identity.userId);
    return this.sessions.read(identity, async (state) => {
      const resolved = resolveRemotePath(state.currentPath, path);
      const entry = await this.remote.info(resolved, profile.credentials);
      if (entry.kind === 'directory') return { entry };
      const url = await this.remote.link(resolved, profile.credentials);
      return { entry, url };
    });
  }

  public async download(identity: SessionIdentity, target: EntryTarget): Promise<DownloadOutcome> {
    const profile = this.profiles.resolveProfile(identity.userId);
    return this.sessions.read(identity, async (state): Promise<DownloadOutcome> => {
      if (typeof target === 'number') {
        const entry = resolveIndex(requireView(state), target);
        if (entry.kind === 'directory') {
          throw new InvalidTargetError(`${entry.name} is a directory`);
        }
        const url = await this.remote.link(entry.path, profile.credentials);
        return { kind: 'link', link: { entry, url } };
      }
      const resolved = resolveRemotePath(state.currentPath, target);
      const detail = await this.remote.info(resolved, profile.credentials);
      if (detail.kind === 'directory') {
        throw new InvalidTargetError(`${resolved} is a directory`);
      }
      return { kind: 'retrieval', retrieval: await this.retrieval(identity, detail, profile) };
    });
  }

  /** Deletes a remote file or directory and returns its path. */
  public async remove(identity: SessionIdentity, target: EntryTarget): Promise<string> {
    const profile = this.profiles.resolveProfile(identity.userId);
    return this.sessions.update(identity, async (state) => {
      const path =
        typeof target === 'number'
          ? resolveIndex(requireView(state), target).path
          : resolveRemotePath(state.currentPath, target);
      if (path === '/') throw new InvalidTargetError('Refusing to remove the root directory');

      await this.remote.delete(path, profile.credentials);
      this.cache.invalidateForMutation(path);
      this.cache.invalidate(path, { descendants: true });
      this.logger.info('remote_entry_removed', { sessionKey: state.key, path, credentialId: profile.credentialId });

      let next = this.dropViewOf(state, parentRemotePath(path));
      if (isSameOrDescendant(next.currentPath, path)) {
        next = {
          ...next,
          currentPath: parentRemotePath(path),
          navStack: next.navStack.filter((p) => !isSameOrDescendant(p, path)),
          view: null,
        };
      }
      return { state: next, result: path };
    });
  }

  public async mkdir(identity: SessionIdentity, path: string): Promise<string> {
    const profile = this.profiles.resolveProfile(identity.userId);
    return this.sessions.update(identity, async (state) => {
      const resolved = resolveRemotePath(state.currentPath, path);
      if (resolved === '/') throw new InvalidTargetError('The root directory already exists');
      await this.remote.mkdir(resolved, profile.credentials);
      this.cache.invalidateForMutation(resolved);
      this.logger.info('remote_directory_created', {
        sessionKey: state.key,
        path: resolved,
        credentialId: profile.credentialId,
      });
      return { state: this.dropViewOf(state, parentRemotePath(resolved)), result: resolved };
    });
  }

  public snapshot(identity: SessionIdentity): SessionSnapshot {
    const state = this.sessions.getOrCreate(identity);
    return {
      key: state.key,
      mode: activeMode(state),
      currentPath: state.currentPath,
      depth: state.navStack.length,
      view: state.view ? renderView(state.view) : null,
    };
  }

  private async movePage(identity: SessionIdentity, delta: 1 | -1): Promise<PageMove> {
    return this.sessions.update<PageMove>(identity, (state) => {
      const view = requireView(state);
      const step = stepPage(view, delta);
      if (step.boundary) {
        return { state, result: { view: renderView(view), boundary: true } };
      }
      const moved: ListingView = { ...view, pageIndex: step.pageIndex };
      return { state: { ...state, view: moved }, result: { view: renderView(moved), boundary: false } };
    });
  }

  /**
   * Fetches `path` and returns the state showing it. Only `descend` pushes the
   * current path; `jump` and `relist` leave the stack alone.
   */
  private async showDirectory(
    state: SessionState,
    profile: Profile,
    rawPath: string,
    move: 'descend' | 'jump' | 'relist'
  ): Promise<SessionState> {
    const path = normalizeRemotePath(rawPath);
    const listing = await this.fetchListing(path, profile);
    const navStack =
      move === 'descend' && path !== state.currentPath ? [...state.navStack, state.currentPath] : state.navStack;
    return withView(
      { ...state, currentPath: path, navStack },
      {
        source: 'listing',
        path,
        entries: sortEntries(listing.entries),
        pageSize: profile.pageSize,
        fetchedAt: listing.fetchedAt,
        fromCache: listing.fromCache,
      }
    );
  }

  private async fetchListing(path: string, profile: Profile): Promise<ListingResult> {
    return this.cache.getOrFetch(
      path,
      profile.credentialId,
      () => this.remote.list(path, profile.credentials),
      { ttlMs: profile.cacheTtlMs, bypass: !profile.cacheEnabled }
    );
  }

  private async retrieval(
    identity: SessionIdentity,
    entry: EntryDetail,
    profile: Profile
  ): Promise<RetrievalDescriptor> {
    if (entry.size > profile.limits.maxDownloadBytes) {
      throw new SizeLimitExceededError(entry.name, entry.size, profile.limits.maxDownloadBytes);
    }
    const url = await this.remote.link(entry.path, profile.credentials);
    return {
      entry,
      url,
      stagingName: stagingFileName(identity.userId, entry.name, this.clock.now()),
    };
  }

  private listingOutcome(state: SessionState): ListOutcome {
    return { kind: 'listing', view: renderView(requireView(state)) };
  }

  private dropViewOf(state: SessionState, directory: string): SessionState {
    if (state.view?.source === 'listing' && state.view.path === directory) {
      return { ...state, view: null };
    }
    return state;
  }
}
