import path from 'node:path';
import { systemClock, type Clock } from './clock.js';
import {
  errorMessage,
  JobInProgressError,
  JobNotFoundError,
  PartialFailureError,
  type PartialFailureItem,
} from './errors.js';
import type { ListingCache } from './listing-cache.js';
import type { ProfileResolver } from './navigation-controller.js';
import { joinRemotePath, normalizeRemotePath, parentRemotePath, remoteBaseName } from './paths.js';
import { sessionKey, sessionKeyPart, type SessionIdentity } from './session-store.js';
import type { AutoBackupRule, Profile } from './settings-store.js';
import type { TaskRegistry } from './task-registry.js';
import type { ChatFile, ChatFileStore, Logger, RemoteFileService } from './types.js';
import { noopLogger } from './types.js';

export type TransferDirection = 'backup' | 'restore';
export type TransferItemStatus = 'pending' | 'transferred' | 'skipped' | 'failed';
export type TransferJobStatus = 'pending' | 'running' | 'complete' | 'partial' | 'failed' | 'cancelled';

export interface TransferItem {
  /** 1-based position in enumeration order. */
  readonly index: number;
  readonly name: string;
  readonly source: string;
  readonly destination: string;
  readonly size: number;
  readonly status: TransferItemStatus;
  readonly error: string | null;
}

export interface TransferJob {
  readonly id: string;
  readonly sessionKey: string;
  readonly direction: TransferDirection;
  /** Chat scope the job reads from (backup) or writes into (restore). */
  readonly scope: string;
  readonly source: string;
  readonly destination: string;
  readonly force: boolean;
  readonly items: readonly TransferItem[];
  readonly status: TransferJobStatus;
  readonly truncated: boolean;
  readonly startedAt: string;
  readonly finishedAt: string | null;
  readonly error: string | null;
}

export type JobEventKind = 'job:started' | 'job:finished';

export interface JobEvent {
  readonly kind: JobEventKind;
  readonly jobId: string;
  readonly job: TransferJob;
  readonly ts: string;
}

export type JobEventListener = (event: JobEvent) => void;

export interface BackupOptions {
  readonly scope?: string | undefined;
  readonly destination?: string | undefined;
  readonly force?: boolean | undefined;
}

export interface RestoreOptions {
  readonly source: string;
  readonly scope?: string | undefined;
  readonly force?: boolean | undefined;
}

export interface AutoBackupSource {
  listAutoBackups(): readonly AutoBackupRule[];
}

export interface TransferJobEngineDeps {
  readonly chatFiles: ChatFileStore;
  readonly remote: RemoteFileService;
  readonly cache: ListingCache;
  readonly profiles: ProfileResolver;
  readonly tasks: TaskRegistry;
  readonly autoBackups?: AutoBackupSource;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly onJobEvent?: JobEventListener;
}

interface MutableItem {
  index: number;
  name: string;
  source: string;
  destination: string;
  size: number;
  status: TransferItemStatus;
  error: string | null;
}

interface JobRecord {
  readonly id: string;
  readonly sessionKey: string;
  readonly direction: TransferDirection;
  readonly scope: string;
  readonly source: string;
  readonly destination: string;
  readonly force: boolean;
  items: MutableItem[];
  status: TransferJobStatus;
  truncated: boolean;
  readonly startedAt: string;
  finishedAt: string | null;
  error: string | null;
}

interface BackupWork {
  readonly item: MutableItem;
  readonly file: ChatFile;
  readonly directory: string;
}

interface RestoreWork {
  readonly item: MutableItem;
  readonly folder: string;
}

function generateJobId(): string {
  return `job_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

/** Session key used for jobs started by an autobackup rule rather than a user. */
export function autoBackupSessionKey(scope: string): string {
  return `auto::${sessionKeyPart(scope)}`;
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Once `signal`
 * aborts no further item is started; items already started run to completion.
 */
export async function mapWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const item = items[next];
      next++;
      if (item !== undefined) await fn(item);
    }
  };
  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.max(1, Math.min(limit, items.length)); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);
}

/** The itemized error for a job that finished with failed items, otherwise null. */
export function toPartialFailure(job: TransferJob): PartialFailureError | null {
  if (job.status !== 'partial') return null;
  const failures: PartialFailureItem[] = job.items
    .filter((item) => item.status === 'failed')
    .map((item) => ({ name: item.name, source: item.source, reason: item.error ?? 'unknown error' }));
  return new PartialFailureError(job.id, job.items.length, failures);
}

function snapshotJob(record: JobRecord): TransferJob {
  return {
    id: record.id,
    sessionKey: record.sessionKey,
    direction: record.direction,
    scope: record.scope,
    source: record.source,
    destination: record.destination,
    force: record.force,
    items: record.items.map((item) => ({ ...item })),
    status: record.status,
    truncated: record.truncated,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
    error: record.error,
  };
}

function isTerminal(status: TransferJobStatus): boolean {
  return status !== 'pending' && status !== 'running';
}

/**
 * Backup (chat scope -> remote) and restore (remote -> chat scope) jobs. Each
 * job is a background task keyed by its id; one item's failure never stops
 * the others.
 */
export class TransferJobEngine {
  private readonly chatFiles: ChatFileStore;
  private readonly remote: RemoteFileService;
  private readonly cache: ListingCache;
  private readonly profiles: ProfileResolver;
  private readonly tasks: TaskRegistry;
  private readonly autoBackups: AutoBackupSource | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onJobEvent: JobEventListener | undefined;
  private readonly jobs = new Map<string, JobRecord>();
  private readonly latestBySession = new Map<string, string>();

  public constructor(deps: TransferJobEngineDeps) {
    this.chatFiles = deps.chatFiles;
    this.remote = deps.remote;
    this.cache = deps.cache;
    this.profiles = deps.profiles;
    this.tasks = deps.tasks;
    this.autoBackups = deps.autoBackups;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? noopLogger;
    this.onJobEvent = deps.onJobEvent;
  }

  public startBackup(identity: SessionIdentity, options: BackupOptions = {}): TransferJob {
    const profile = this.profiles.resolveProfile(identity.userId);
    const scope = options.scope ?? identity.scope;
    const destination = normalizeRemotePath(options.destination ?? joinRemotePath(profile.backupRoot, scope));
    return this.launch(sessionKey(identity), profile, {
      direction: 'backup',
      scope,
      source: `@${scope}`,
      destination,
      force: options.force ?? false,
    });
  }

  public startRestore(identity: SessionIdentity, options: RestoreOptions): TransferJob {
    const profile = this.profiles.resolveProfile(identity.userId);
    const scope = options.scope ?? identity.scope;
    return this.launch(sessionKey(identity), profile, {
      direction: 'restore',
      scope,
      source: normalizeRemotePath(options.source),
      destination: `@${scope}`,
      force: options.force ?? false,
    });
  }

  /** Starts the rule's backup with its owner's credentials; null when disabled or already running. */
  public runAutoBackup(rule: AutoBackupRule): TransferJob | null {
    if (!rule.enabled) return null;
    const key = autoBackupSessionKey(rule.scope);
    if (this.runningJobFor(key)) {
      this.logger.info('autobackup_skipped', { scope: rule.scope, reason: 'job_in_progress' });
      return null;
    }
    const profile = this.profiles.resolveProfile(rule.ownerUserId);
    return this.launch(key, profile, {
      direction: 'backup',
      scope: rule.scope,
      source: `@${rule.scope}`,
      destination: normalizeRemotePath(rule.destination),
      force: false,
    });
  }

  public runAutoBackups(): TransferJob[] {
    const started: TransferJob[] = [];
    for (const rule of this.autoBackups?.listAutoBackups() ?? []) {
      try {
        const job = this.runAutoBackup(rule);
        if (job) started.push(job);
      } catch (err) {
        this.logger.error('autobackup_failed', { scope: rule.scope, message: errorMessage(err) });
      }
    }
    return started;
  }

  public getJob(jobId: string): TransferJob {
    const record = this.jobs.get(jobId);
    if (!record) throw new JobNotFoundError(jobId);
    return snapshotJob(record);
  }

  public listJobs(sessionKeyFilter?: string): TransferJob[] {
    const result: TransferJob[] = [];
    for (const record of this.jobs.values()) {
      if (sessionKeyFilter === undefined || record.sessionKey === sessionKeyFilter) {
        result.push(snapshotJob(record));
      }
    }
    return result;
  }

  public async waitForJob(jobId: string): Promise<TransferJob> {
    if (!this.jobs.has(jobId)) throw new JobNotFoundError(jobId);
    await this.tasks.wait(jobId);
    return this.getJob(jobId);
  }

  /** Stops scheduling further items. Returns false when the job had already finished. */
  public cancelJob(jobId: string): boolean {
    const record = this.jobs.get(jobId);
    if (!record) throw new JobNotFoundError(jobId);
    if (isTerminal(record.status)) return false;
    const cancelled = this.tasks.cancel(jobId);
    if (cancelled) {
      this.logger.info('transfer_job_cancel_requested', { jobId, sessionKey: record.sessionKey });
    }
    return cancelled;
  }

  private runningJobFor(key: string): JobRecord | null {
    const jobId = this.latestBySession.get(key);
    const record = jobId ? this.jobs.get(jobId) : undefined;
    return record && !isTerminal(record.status) ? record : null;
  }

  private launch(
    key: string,
    profile: Profile,
    plan: Pick<JobRecord, 'direction' | 'scope' | 'source' | 'destination' | 'force'>
  ): TransferJob {
    const running = this.runningJobFor(key);
    if (running) throw new JobInProgressError(running.id);

    const previous = this.latestBySession.get(key);
    if (previous) this.jobs.delete(previous);
    this.tasks.prune();

    const record: JobRecord = {
      ...plan,
      id: generateJobId(),
      sessionKey: key,
      items: [],
      status: 'pending',
      truncated: false,
      startedAt: new Date(this.clock.now()).toISOString(),
      finishedAt: null,
      error: null,
    };
    this.jobs.set(record.id, record);
    this.latestBySession.set(key, record.id);
    this.emit('job:started', record);
    this.logger.info('transfer_job_started', {
      jobId: record.id,
      sessionKey: key,
      direction: record.direction,
      source: record.source,
      destination: record.destination,
      credentialId: profile.credentialId,
    });

    this.tasks.spawn(record.id, async (signal) => {
      record.status = 'running';
      try {
        if (record.direction === 'backup') {
          await this.runBackup(record, profile, signal);
        } else {
          await this.runRestore(record, profile, signal);
        }
        record.status = this.finalStatus(record, signal);
      } catch (err) {
        record.status = 'failed';
        record.error = errorMessage(err);
      }
      this.finish(record);
    });

    return snapshotJob(record);
  }

  private finalStatus(record: JobRecord, signal: AbortSignal): TransferJobStatus {
    if (signal.aborted) return 'cancelled';
    return record.items.some((item) => item.status === 'failed') ? 'partial' : 'complete';
  }

  private finish(record: JobRecord): void {
    record.finishedAt = new Date(this.clock.now()).toISOString();
    const counts = { transferred: 0, skipped: 0, failed: 0, pending: 0 };
    for (const item of record.items) counts[item.status]++;
    const context = { jobId: record.id, sessionKey: record.sessionKey, status: record.status, ...counts };
    if (record.status === 'failed') {
      this.logger.error('transfer_job_finished', { ...context, error: record.error });
    } else {
      this.logger.info('transfer_job_finished', context);
    }
    this.emit('job:finished', record);
  }

  private async runBackup(record: JobRecord, profile: Profile, signal: AbortSignal): Promise<void> {
    const all = await this.chatFiles.listFiles(record.scope);
    const files = all.slice(0, profile.maxJobItems);
    record.truncated = all.length > files.length;

    const work: BackupWork[] = files.map((file, i) => {
      const directory = joinRemotePath(record.destination, file.folder);
      return {
        file,
        directory,
        item: {
          index: i + 1,
          name: file.name,
          source: file.folder.length > 0 ? `${file.folder}/${file.name}` : file.name,
          destination: joinRemotePath(directory, file.name),
          size: file.size,
          status: 'pending',
          error: null,
        },
      };
    });
    record.items = work.map((w) => w.item);

    const prepared = new Map<string, Promise<ReadonlySet<string>>>();
    const prepare = (directory: string): Promise<ReadonlySet<string>> => {
      let pending = prepared.get(directory);
      if (!pending) {
        pending = this.prepareRemoteDirectory(directory, profile);
        prepared.set(directory, pending);
      }
      return pending;
    };

    try {
      await mapWithConcurrency(
        work,
        profile.transferConcurrency,
        async ({ item, file, directory }) => {
          try {
            const existing = await prepare(directory);
            if (!record.force && existing.has(item.name)) {
              item.status = 'skipped';
              return;
            }
            const content = await file.read();
            await this.remote.upload(directory, item.name, content, profile.credentials);
            item.status = 'transferred';
          } catch (err) {
            item.status = 'failed';
            item.error = errorMessage(err);
          }
        },
        signal
      );
    } finally {
      this.cache.invalidateForMutation(record.destination);
    }
  }

  /** Creates `directory` (and its parents) and returns the names already in it. */
  private async prepareRemoteDirectory(directory: string, profile: Profile): Promise<ReadonlySet<string>> {
    const chain: string[] = [];
    for (let dir = directory; dir !== '/'; dir = parentRemotePath(dir)) chain.unshift(dir);
    for (const dir of chain) {
      await this.remote.mkdir(dir, profile.credentials);
    }
    const entries = await this.remote.list(directory, profile.credentials);
    return new Set(entries.filter((e) => e.kind === 'file').map((e) => e.name));
  }

  private async runRestore(record: JobRecord, profile: Profile, signal: AbortSignal): Promise<void> {
    const { work, truncated } = await this.enumerateRemote(record.source, profile, signal);
    record.items = work.map((w) => w.item);
    record.truncated = truncated;

    await mapWithConcurrency(
      work,
      profile.transferConcurrency,
      async ({ item, folder }) => {
        try {
          if (!record.force && (await this.chatFiles.exists(record.scope, folder, item.name))) {
            item.status = 'skipped';
            return;
          }
          const content = await this.remote.read(item.source, profile.credentials);
          await this.chatFiles.putFile(record.scope, folder, item.name, content);
          item.status = 'transferred';
        } catch (err) {
          item.status = 'failed';
          item.error = errorMessage(err);
        }
      },
      signal
    );
  }

  /** Breadth-first walk of the remote subtree under `source`, bounded by `maxJobItems` files. */
  private async enumerateRemote(
    source: string,
    profile: Profile,
    signal: AbortSignal
  ): Promise<{ work: RestoreWork[]; truncated: boolean }> {
    const work: RestoreWork[] = [];
    const push = (name: string, remotePath: string, size: number, folder: string): void => {
      work.push({
        folder,
        item: {
          index: work.length + 1,
          name,
          source: remotePath,
          destination: folder.length > 0 ? `${folder}/${name}` : name,
          size,
          status: 'pending',
          error: null,
        },
      });
    };

    const root = await this.remote.info(source, profile.credentials);
    if (root.kind === 'file') {
      push(root.name, source, root.size, '');
      return { work, truncated: false };
    }

    const queue: string[] = [source];
    while (queue.length > 0) {
      if (signal.aborted) break;
      const dir = queue.shift();
      if (dir === undefined) break;
      const entries = await this.remote.list(dir, profile.credentials);
      const folder = path.posix.relative(source, dir);
      for (const entry of entries) {
        if (entry.kind === 'directory') {
          queue.push(entry.path);
          continue;
        }
        if (work.length >= profile.maxJobItems) {
          return { work, truncated: true };
        }
        push(entry.name || remoteBaseName(entry.path), entry.path, entry.size, folder);
      }
    }
    return { work, truncated: false };
  }

  private emit(kind: JobEventKind, record: JobRecord): void {
    if (!this.onJobEvent) return;
    this.onJobEvent({ kind, jobId: record.id, job: snapshotJob(record), ts: new Date().toISOString() });
  }
}
