import { sleep, systemClock, type Clock } from './clock.js';
import { ExtensionNotAllowedError, NotInUploadModeError, SizeLimitExceededError } from './errors.js';
import type { ListingCache } from './listing-cache.js';
import { fileExtension, joinRemotePath } from './paths.js';
import type { ProfileResolver } from './navigation-controller.js';
import { sessionKey, type SessionIdentity, type SessionStore, type UploadSession } from './session-store.js';
import type { TransferLimits } from './settings-store.js';
import type { TaskRegistry } from './task-registry.js';
import type { Logger, RemoteFileService } from './types.js';
import { noopLogger } from './types.js';

export const DEFAULT_UPLOAD_WINDOW_MS = 600_000;

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.webp', '.bmp'];

export interface InboundAttachment {
  readonly name: string;
  readonly kind: 'file' | 'image';
  readonly size: number;
  read(): Promise<Uint8Array>;
}

export type AttachmentOutcome =
  | { readonly kind: 'ignored' }
  | { readonly kind: 'uploaded'; readonly name: string; readonly targetPath: string; readonly size: number };

export interface UploadStatus {
  readonly active: boolean;
  readonly targetPath?: string | undefined;
  readonly remainingMs?: number | undefined;
}

export interface UploadModeControllerDeps {
  readonly sessions: SessionStore;
  readonly cache: ListingCache;
  readonly remote: RemoteFileService;
  readonly profiles: ProfileResolver;
  readonly tasks: TaskRegistry;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly windowMs?: number;
}

export function uploadTaskId(identity: SessionIdentity): string {
  return `upload:${sessionKey(identity)}`;
}

/** Chat images arrive without a usable name; they are stored as `image_<unix seconds><ext>`. */
export function imageUploadName(sourceName: string, nowMs: number): string {
  const ext = fileExtension(sourceName);
  return `image_${Math.floor(nowMs / 1000)}${IMAGE_EXTENSIONS.includes(ext) ? ext : '.jpg'}`;
}

/** Throws when `attachment` may not be uploaded under `limits`. */
export function checkUploadPolicy(attachment: InboundAttachment, name: string, limits: TransferLimits): void {
  if (attachment.size > limits.maxUploadBytes) {
    throw new SizeLimitExceededError(name, attachment.size, limits.maxUploadBytes);
  }
  if (attachment.kind === 'image' || limits.allowedExtensions.length === 0) return;
  const ext = fileExtension(name);
  if (!limits.allowedExtensions.includes(ext)) {
    throw new ExtensionNotAllowedError(name, ext);
  }
}

function generateUploadId(): string {
  return `upl_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Timed gate that turns the next qualifying attachment into one upload.
 * Idle -> Active(deadline) -> Idle on receipt, cancel or expiry.
 */
export class UploadModeController {
  private readonly sessions: SessionStore;
  private readonly cache: ListingCache;
  private readonly remote: RemoteFileService;
  private readonly profiles: ProfileResolver;
  private readonly tasks: TaskRegistry;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly windowMs: number;

  public constructor(deps: UploadModeControllerDeps) {
    this.sessions = deps.sessions;
    this.cache = deps.cache;
    this.remote = deps.remote;
    this.profiles = deps.profiles;
    this.tasks = deps.tasks;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? noopLogger;
    this.windowMs = deps.windowMs ?? DEFAULT_UPLOAD_WINDOW_MS;
  }

  /** Enters upload mode targeting the current path; an active upload is replaced. */
  public async begin(identity: SessionIdentity): Promise<UploadSession> {
    this.profiles.resolveProfile(identity.userId);
    return this.sessions.update(identity, (state) => {
      const now = this.clock.now();
      const upload: UploadSession = {
        id: generateUploadId(),
        sessionKey: state.key,
        targetPath: state.currentPath,
        createdAt: now,
        deadline: now + this.windowMs,
        state: 'active',
      };
      this.armDeadline(identity, upload);
      this.logger.info('upload_mode_started', {
        sessionKey: state.key,
        targetPath: upload.targetPath,
        deadline: new Date(upload.deadline).toISOString(),
      });
      return { state: { ...state, upload }, result: upload };
    });
  }

  public async cancel(identity: SessionIdentity): Promise<UploadSession> {
    return this.sessions.update<UploadSession>(identity, (state) => {
      const upload = state.upload;
      if (!upload || upload.state !== 'active' || this.clock.now() >= upload.deadline) {
        throw new NotInUploadModeError();
      }
      this.tasks.cancel(uploadTaskId(identity));
      this.logger.info('upload_mode_cancelled', { sessionKey: state.key });
      return { state: { ...state, upload: null }, result: { ...upload, state: 'cancelled' } };
    });
  }

  public status(identity: SessionIdentity): UploadStatus {
    const upload = this.sessions.peek(identity)?.upload;
    const now = this.clock.now();
    if (!upload || upload.state !== 'active' || now >= upload.deadline) {
      return { active: false };
    }
    return { active: true, targetPath: upload.targetPath, remainingMs: upload.deadline - now };
  }

  /**
   * Offers an inbound attachment. Outside upload mode it is ignored. Policy
   * rejections throw and keep the mode active; a qualifying attachment ends the
   * mode before its single upload attempt.
   */
  public async receiveAttachment(
    identity: SessionIdentity,
    attachment: InboundAttachment
  ): Promise<AttachmentOutcome> {
    const claim = await this.sessions.update<{ upload: UploadSession; name: string } | null>(
      identity,
      (state) => {
        const upload = state.upload;
        if (!upload || upload.state !== 'active') {
          return { state, result: null };
        }
        if (this.clock.now() >= upload.deadline) {
          this.tasks.cancel(uploadTaskId(identity));
          this.logger.info('upload_expired', { sessionKey: state.key, targetPath: upload.targetPath });
          return { state: { ...state, upload: null }, result: null };
        }
        const profile = this.profiles.resolveProfile(identity.userId);
        const name =
          attachment.kind === 'image' ? imageUploadName(attachment.name, this.clock.now()) : attachment.name;
        checkUploadPolicy(attachment, name, profile.limits);
        this.tasks.cancel(uploadTaskId(identity));
        return { state: { ...state, upload: null }, result: { upload: { ...upload, state: 'consumed' }, name } };
      }
    );
    if (!claim) return { kind: 'ignored' };

    const { upload, name } = claim;
    const profile = this.profiles.resolveProfile(identity.userId);
    const content = await attachment.read();
    try {
      await this.remote.upload(upload.targetPath, name, content, profile.credentials);
    } catch (err) {
      this.logger.warn('upload_failed', { sessionKey: upload.sessionKey, targetPath: upload.targetPath, name });
      throw err;
    }
    this.cache.invalidateForMutation(joinRemotePath(upload.targetPath, name));
    this.logger.info('upload_completed', {
      sessionKey: upload.sessionKey,
      targetPath: upload.targetPath,
      name,
      size: content.byteLength,
      credentialId: profile.credentialId,
    });
    return { kind: 'uploaded', name, targetPath: upload.targetPath, size: content.byteLength };
  }

  private armDeadline(identity: SessionIdentity, upload: UploadSession): void {
    this.tasks.spawn(uploadTaskId(identity), async (signal) => {
      await sleep(this.clock, upload.deadline - upload.createdAt, signal);
      await this.sessions.update(identity, (state) => {
        if (state.upload?.id !== upload.id) return { state, result: undefined };
        this.logger.info('upload_expired', { sessionKey: state.key, targetPath: upload.targetPath });
        return { state: { ...state, upload: null }, result: undefined };
      });
    });
  }
}
