import type { Command } from './commands.js';
import { COMMAND_HELP } from './commands.js';
import { JobNotFoundError } from './errors.js';
import type { ListingCache } from './listing-cache.js';
import type {
  InfoResult,
  LinkDescriptor,
  NavigationController,
  RenderedView,
  RetrievalDescriptor,
} from './navigation-controller.js';
import { joinRemotePath, resolveRemotePath } from './paths.js';
import { sessionKey, type SessionIdentity, type SessionStore, type UploadSession } from './session-store.js';
import type { AutoBackupRule, SettingsStore } from './settings-store.js';
import { autoBackupSessionKey, type TransferJob, type TransferJobEngine } from './transfer-jobs.js';
import type { Logger, RemoteFileService } from './types.js';
import { noopLogger } from './types.js';
import type { UploadModeController, UploadStatus } from './upload-mode.js';

export type CommandResult =
  | { readonly kind: 'listing'; readonly view: RenderedView }
  | { readonly kind: 'page'; readonly view: RenderedView; readonly boundary: boolean }
  | { readonly kind: 'link'; readonly link: LinkDescriptor }
  | { readonly kind: 'retrieval'; readonly retrieval: RetrievalDescriptor }
  | { readonly kind: 'info'; readonly info: InfoResult }
  | { readonly kind: 'upload_started'; readonly upload: UploadSession }
  | { readonly kind: 'upload_cancelled'; readonly upload: UploadSession }
  | { readonly kind: 'job'; readonly job: TransferJob }
  | { readonly kind: 'jobs'; readonly jobs: readonly TransferJob[] }
  | { readonly kind: 'job_cancel'; readonly jobId: string; readonly cancelled: boolean }
  | { readonly kind: 'autobackup'; readonly rule: AutoBackupRule }
  | { readonly kind: 'removed'; readonly path: string }
  | { readonly kind: 'created'; readonly path: string }
  | { readonly kind: 'config'; readonly settings: Readonly<Record<string, string | number | boolean>> }
  | { readonly kind: 'config_setup'; readonly steps: readonly string[] }
  | { readonly kind: 'config_test'; readonly entries: number }
  | { readonly kind: 'config_updated'; readonly key: string }
  | { readonly kind: 'cache_cleared'; readonly removed: number }
  | { readonly kind: 'help'; readonly commands: typeof COMMAND_HELP; readonly upload: UploadStatus };

export interface CommandRouterDeps {
  readonly navigation: NavigationController;
  readonly uploads: UploadModeController;
  readonly jobs: TransferJobEngine;
  readonly settings: SettingsStore;
  readonly sessions: SessionStore;
  readonly cache: ListingCache;
  readonly remote: RemoteFileService;
  readonly logger?: Logger;
}

const SETUP_STEPS: readonly string[] = [
  'config set serverUrl https://files.example.com',
  'config set username <name>   (optional)',
  'config set password <password>   (optional)',
  'config set token <token>   (optional, instead of username/password)',
  'config test',
  'ls /',
];

/** Routes parsed commands to the controller that owns them. */
export class CommandRouter {
  private readonly navigation: NavigationController;
  private readonly uploads: UploadModeController;
  private readonly jobs: TransferJobEngine;
  private readonly settings: SettingsStore;
  private readonly sessions: SessionStore;
  private readonly cache: ListingCache;
  private readonly remote: RemoteFileService;
  private readonly logger: Logger;

  public constructor(deps: CommandRouterDeps) {
    this.navigation = deps.navigation;
    this.uploads = deps.uploads;
    this.jobs = deps.jobs;
    this.settings = deps.settings;
    this.sessions = deps.sessions;
    this.cache = deps.cache;
    this.remote = deps.remote;
    this.logger = deps.logger ?? noopLogger;
  }

  public async dispatch(identity: SessionIdentity, command: Command): Promise<CommandResult> {
    switch (command.kind) {
      case 'ls': {
        const outcome = await this.navigation.list(identity, command.target);
        if (outcome.kind === 'listing') return { kind: 'listing', view: outcome.view };
        if (outcome.kind === 'link') return { kind: 'link', link: outcome.link };
        return { kind: 'retrieval', retrieval: outcome.retrieval };
      }
      case 'next':
      case 'prev': {
        const move =
          command.kind === 'next' ? await this.navigation.next(identity) : await this.navigation.prev(identity);
        return { kind: 'page', view: move.view, boundary: move.boundary };
      }
      case 'quit':
        return { kind: 'listing', view: await this.navigation.quit(identity) };
      case 'search':
        return { kind: 'listing', view: await this.navigation.search(identity, command.term, command.path) };
      case 'info':
        return { kind: 'info', info: await this.navigation.info(identity, command.path) };
      case 'download': {
        const outcome = await this.navigation.download(identity, command.target);
        return outcome.kind === 'link'
          ? { kind: 'link', link: outcome.link }
          : { kind: 'retrieval', retrieval: outcome.retrieval };
      }
      case 'upload':
        return command.cancel
          ? { kind: 'upload_cancelled', upload: await this.uploads.cancel(identity) }
          : { kind: 'upload_started', upload: await this.uploads.begin(identity) };
      case 'backup': {
        const destination =
          command.path === undefined ? undefined : this.resolveForSession(identity, command.path);
        const job = this.jobs.startBackup(identity, { scope: command.scope, destination, force: command.force });
        return { kind: 'job', job };
      }
      case 'restore': {
        const source = this.resolveForSession(identity, command.path);
        const job = this.jobs.startRestore(identity, { source, scope: command.scope, force: command.force });
        return { kind: 'job', job };
      }
      case 'autobackup':
        return { kind: 'autobackup', rule: this.setAutoBackup(identity, command.enabled, command.scope, command.path) };
      case 'rm':
        return { kind: 'removed', path: await this.navigation.remove(identity, command.target) };
      case 'mkdir':
        return { kind: 'created', path: await this.navigation.mkdir(identity, command.path) };
      case 'jobs':
        if (command.jobId !== undefined) {
          return { kind: 'job', job: this.ownJob(identity, command.jobId) };
        }
        return { kind: 'jobs', jobs: this.jobs.listJobs(sessionKey(identity)) };
      case 'jobs_cancel':
        this.ownJob(identity, command.jobId);
        return { kind: 'job_cancel', jobId: command.jobId, cancelled: this.jobs.cancelJob(command.jobId) };
      case 'config':
        return this.config(identity, command.action);
      case 'config_set': {
        this.settings.setUserValue(identity.userId, command.key, command.value);
        await this.sessions.reset(identity);
        this.logger.info('user_setting_updated', { userId: identity.userId, key: command.key });
        return { kind: 'config_updated', key: command.key };
      }
      case 'help':
        return { kind: 'help', commands: COMMAND_HELP, upload: this.uploads.status(identity) };
    }
  }

  private async config(
    identity: SessionIdentity,
    action: 'show' | 'setup' | 'test' | 'clear_cache'
  ): Promise<CommandResult> {
    switch (action) {
      case 'show':
        return { kind: 'config', settings: this.settings.describeProfile(identity.userId) };
      case 'setup':
        return { kind: 'config_setup', steps: SETUP_STEPS };
      case 'test': {
        const profile = this.settings.resolveProfile(identity.userId);
        const entries = await this.remote.list('/', profile.credentials);
        this.logger.info('connection_test_succeeded', { credentialId: profile.credentialId });
        return { kind: 'config_test', entries: entries.length };
      }
      case 'clear_cache': {
        const profile = this.settings.resolveProfile(identity.userId);
        const removed = this.cache.clear(profile.credentialId);
        this.logger.info('listing_cache_cleared', { credentialId: profile.credentialId, removed });
        return { kind: 'cache_cleared', removed };
      }
    }
  }

  private setAutoBackup(
    identity: SessionIdentity,
    enabled: boolean,
    scopeArg: string | undefined,
    pathArg: string | undefined
  ): AutoBackupRule {
    const profile = this.settings.resolveProfile(identity.userId);
    const scope = scopeArg ?? identity.scope;
    const existing = this.settings.getAutoBackup(scope);
    const destination =
      pathArg !== undefined
        ? this.resolveForSession(identity, pathArg)
        : existing?.destination ?? joinRemotePath(profile.backupRoot, scope);
    const rule = this.settings.setAutoBackup({ scope, destination, enabled, ownerUserId: identity.userId });
    this.logger.info('autobackup_rule_updated', { scope, destination, enabled, ownerUserId: identity.userId });
    return rule;
  }

  /** Jobs of other sessions read as unknown; autobackup jobs belong to their scope. */
  private ownJob(identity: SessionIdentity, jobId: string): TransferJob {
    const job = this.jobs.getJob(jobId);
    if (job.sessionKey !== sessionKey(identity) && job.sessionKey !== autoBackupSessionKey(identity.scope)) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  private resolveForSession(identity: SessionIdentity, target: string): string {
    return resolveRemotePath(this.navigation.snapshot(identity).currentPath, target);
  }
}
