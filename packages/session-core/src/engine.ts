import { systemClock, type Clock } from './clock.js';
import { CommandRouter, type CommandResult } from './command-router.js';
import { parseCommand, type ParseOptions } from './commands.js';
import { FileListingCacheStore } from './listing-cache-store.js';
import { ListingCache } from './listing-cache.js';
import { NavigationController } from './navigation-controller.js';
import { SessionStore, type SessionIdentity } from './session-store.js';
import type { SettingsStore } from './settings-store.js';
import { TaskRegistry } from './task-registry.js';
import { TransferJobEngine, type JobEventListener } from './transfer-jobs.js';
import type { ChatFileStore, Logger, RemoteFileService } from './types.js';
import { noopLogger } from './types.js';
import { UploadModeController, type AttachmentOutcome, type InboundAttachment } from './upload-mode.js';

export interface ChatDriveOptions {
  readonly settings: SettingsStore;
  readonly remote: RemoteFileService;
  readonly chatFiles: ChatFileStore;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly uploadWindowMs?: number;
  readonly parse?: ParseOptions;
  readonly onJobEvent?: JobEventListener;
  /** Directory for persisted listings; listings stay in memory when omitted. */
  readonly cacheDir?: string;
}

export interface ChatDrive {
  readonly sessions: SessionStore;
  readonly cache: ListingCache;
  readonly tasks: TaskRegistry;
  readonly navigation: NavigationController;
  readonly uploads: UploadModeController;
  readonly jobs: TransferJobEngine;
  readonly router: CommandRouter;
  /** Parses and dispatches one chat line. */
  handleText(identity: SessionIdentity, text: string): Promise<CommandResult>;
  handleAttachment(identity: SessionIdentity, attachment: InboundAttachment): Promise<AttachmentOutcome>;
  /** Cancels every background task. */
  shutdown(): void;
}

/** Wires the session engine around one settings store, remote service and chat file area. */
export function createChatDrive(options: ChatDriveOptions): ChatDrive {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? noopLogger;
  const { settings, remote, chatFiles } = options;

  const sessions = new SessionStore({ clock });
  const cache = new ListingCache({
    clock,
    logger,
    ttlMs: settings.getShared().cacheTtlSeconds * 1000,
    store: options.cacheDir === undefined ? undefined : new FileListingCacheStore(options.cacheDir),
  });
  const tasks = new TaskRegistry(logger);
  const navigation = new NavigationController({ sessions, cache, remote, profiles: settings, clock, logger });
  const uploads = new UploadModeController({
    sessions,
    cache,
    remote,
    profiles: settings,
    tasks,
    clock,
    logger,
    windowMs: options.uploadWindowMs,
  });
  const jobs = new TransferJobEngine({
    chatFiles,
    remote,
    cache,
    profiles: settings,
    tasks,
    autoBackups: settings,
    clock,
    logger,
    onJobEvent: options.onJobEvent,
  });
  const router = new CommandRouter({ navigation, uploads, jobs, settings, sessions, cache, remote, logger });

  return {
    sessions,
    cache,
    tasks,
    navigation,
    uploads,
    jobs,
    router,
    handleText: async (identity, text) => router.dispatch(identity, parseCommand(text, options.parse)),
    handleAttachment: async (identity, attachment) => uploads.receiveAttachment(identity, attachment),
    shutdown: () => tasks.cancelAll(),
  };
}
