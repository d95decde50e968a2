import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  errorMessage,
  noopLogger,
  systemClock,
  type CancelTimer,
  type Clock,
  type Logger,
  type RemoteCredentials,
  type RemoteFileService,
  type RetrievalDescriptor,
} from '@chatdrive/session-core';

export interface StagedFile {
  readonly path: string;
  readonly size: number;
  readonly expiresAt: string;
}

export interface DownloadStagerOptions {
  readonly remote: RemoteFileService;
  readonly directory: string;
  readonly ttlMs: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Fetches files handed out by `ls <path>` / `download <path>` into a local
 * directory the chat adapter sends from, and deletes each one after the TTL.
 */
export class DownloadStager {
  private readonly remote: RemoteFileService;
  private readonly directory: string;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timers = new Map<string, CancelTimer>();
  private readonly cleanups = new Set<Promise<void>>();

  public constructor(options: DownloadStagerOptions) {
    this.remote = options.remote;
    this.directory = options.directory;
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  public async stage(retrieval: RetrievalDescriptor, credentials: RemoteCredentials): Promise<StagedFile> {
    const content = await this.remote.read(retrieval.entry.path, credentials);
    await mkdir(this.directory, { recursive: true, mode: 0o700 });
    const target = path.join(this.directory, retrieval.stagingName);
    await writeFile(target, content, { mode: 0o600 });

    this.timers.get(target)?.();
    this.timers.set(
      target,
      this.clock.schedule(() => this.remove(target), this.ttlMs)
    );
    this.logger.info('download_staged', { path: retrieval.entry.path, stagedAs: retrieval.stagingName });
    return {
      path: target,
      size: content.byteLength,
      expiresAt: new Date(this.clock.now() + this.ttlMs).toISOString(),
    };
  }

  public get stagedCount(): number {
    return this.timers.size;
  }

  /** Resolves once every started cleanup has finished. */
  public async drain(): Promise<void> {
    await Promise.all([...this.cleanups]);
  }

  /** Removes every staged file now. */
  public async close(): Promise<void> {
    for (const [target, cancel] of this.timers) {
      cancel();
      this.remove(target);
    }
    await this.drain();
  }

  private remove(target: string): void {
    this.timers.delete(target);
    const cleanup = rm(target, { force: true }).catch((err: unknown) => {
      this.logger.warn('staged_file_cleanup_failed', { stagedPath: target, message: errorMessage(err) });
    });
    this.cleanups.add(cleanup);
    void cleanup.finally(() => this.cleanups.delete(cleanup));
  }
}
