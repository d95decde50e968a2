import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { InvalidSettingError, NotConfiguredError } from './errors.js';
import { readJsonFile, writeJsonFileAtomic } from './json-file.js';
import { clampCacheTtlMs } from './listing-cache.js';
import { clampPageSize, DEFAULT_PAGE_SIZE } from './pagination.js';
import { normalizeRemotePath } from './paths.js';
import type { RemoteCredentials } from './types.js';

export const DEFAULT_ALLOWED_EXTENSIONS: readonly string[] = [
  '.txt',
  '.pdf',
  '.doc',
  '.docx',
  '.zip',
  '.rar',
  '.jpg',
  '.png',
  '.gif',
  '.mp4',
  '.mp3',
];

export const MIN_TRANSFER_CONCURRENCY = 1;
export const MAX_TRANSFER_CONCURRENCY = 8;

export interface AutoBackupRule {
  readonly scope: string;
  readonly destination: string;
  readonly enabled: boolean;
  /** Whose credentials the trigger uses. */
  readonly ownerUserId: string;
  readonly updatedAt: string;
}

export interface SharedSettings {
  readonly requireUserAuth: boolean;
  readonly serverUrl: string;
  readonly username: string;
  readonly password: string;
  readonly token: string;
  readonly publicServerUrl: string;
  readonly baseDirectory: string;
  readonly pageSize: number;
  /** Lowercase, dot-prefixed. Empty means any extension. */
  readonly allowedExtensions: readonly string[];
  readonly maxDownloadSizeMb: number;
  readonly maxUploadSizeMb: number;
  readonly cacheEnabled: boolean;
  readonly cacheTtlSeconds: number;
  readonly backupRoot: string;
  readonly transferConcurrency: number;
  readonly maxJobItems: number;
  readonly autoBackups: readonly AutoBackupRule[];
}

export interface UserSettings {
  readonly serverUrl?: string;
  readonly username?: string;
  readonly password?: string;
  readonly token?: string;
  readonly pageSize?: number;
}

export type UserSettingKey = keyof UserSettings;

export const USER_SETTING_KEYS: readonly UserSettingKey[] = [
  'serverUrl',
  'username',
  'password',
  'token',
  'pageSize',
];

export const DEFAULT_SHARED_SETTINGS: SharedSettings = {
  requireUserAuth: true,
  serverUrl: '',
  username: '',
  password: '',
  token: '',
  publicServerUrl: '',
  baseDirectory: '',
  pageSize: DEFAULT_PAGE_SIZE,
  allowedExtensions: DEFAULT_ALLOWED_EXTENSIONS,
  maxDownloadSizeMb: 50,
  maxUploadSizeMb: 100,
  cacheEnabled: true,
  cacheTtlSeconds: 300,
  backupRoot: '/backup',
  transferConcurrency: 2,
  maxJobItems: 500,
  autoBackups: [],
};

export interface TransferLimits {
  readonly maxDownloadBytes: number;
  readonly maxUploadBytes: number;
  readonly allowedExtensions: readonly string[];
}

/** Everything a command needs to act for one user, resolved from shared and user settings. */
export interface Profile {
  readonly userId: string;
  readonly mode: 'global' | 'per-user';
  readonly credentials: RemoteCredentials;
  readonly credentialId: string;
  readonly pageSize: number;
  readonly cacheEnabled: boolean;
  readonly cacheTtlMs: number;
  readonly limits: TransferLimits;
  readonly backupRoot: string;
  readonly transferConcurrency: number;
  readonly maxJobItems: number;
}

const SAFE_ID_RE = /^[a-zA-Z0-9_-]+$/;
const MB = 1024 * 1024;

/** Stable, non-secret identity of a credential set, used for cache keys and logs. */
export function credentialIdentity(credentials: Pick<RemoteCredentials, 'serverUrl' | 'username' | 'token'>): string {
  return crypto
    .createHash('sha256')
    .update(`${credentials.serverUrl}\u0000${credentials.username}\u0000${credentials.token}`)
    .digest('hex')
    .slice(0, 16);
}

/** File name for a user record; ids outside the safe alphabet are hashed. */
export function userRecordName(userId: string): string {
  if (SAFE_ID_RE.test(userId)) return `${userId}.json`;
  return `u_${crypto.createHash('sha256').update(userId).digest('hex').slice(0, 24)}.json`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}

export function normalizeExtensions(raw: readonly string[] | string): string[] {
  const parts = typeof raw === 'string' ? raw.split(',') : raw;
  const result: string[] = [];
  for (const part of parts) {
    const trimmed = part.trim().toLowerCase();
    if (trimmed.length === 0) continue;
    const ext = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
    if (!result.includes(ext)) result.push(ext);
  }
  return result;
}

function parseRule(value: unknown): AutoBackupRule | null {
  if (!isRecord(value)) return null;
  const scope = readString(value, 'scope', '');
  const ownerUserId = readString(value, 'ownerUserId', '');
  if (scope.length === 0 || ownerUserId.length === 0) return null;
  return {
    scope,
    destination: normalizeRemotePath(readString(value, 'destination', '/')),
    enabled: readBoolean(value, 'enabled', false),
    ownerUserId,
    updatedAt: readString(value, 'updatedAt', new Date(0).toISOString()),
  };
}

export function parseSharedSettings(value: unknown): SharedSettings {
  if (!isRecord(value)) return DEFAULT_SHARED_SETTINGS;
  const d = DEFAULT_SHARED_SETTINGS;
  const extensions = value['allowedExtensions'];
  const rules = value['autoBackups'];
  return {
    requireUserAuth: readBoolean(value, 'requireUserAuth', d.requireUserAuth),
    serverUrl: readString(value, 'serverUrl', d.serverUrl),
    username: readString(value, 'username', d.username),
    password: readString(value, 'password', d.password),
    token: readString(value, 'token', d.token),
    publicServerUrl: readString(value, 'publicServerUrl', d.publicServerUrl),
    baseDirectory: readString(value, 'baseDirectory', d.baseDirectory),
    pageSize: clampPageSize(readNumber(value, 'pageSize', d.pageSize)),
    allowedExtensions:
      typeof extensions === 'string' ||
      (Array.isArray(extensions) && extensions.every((e): e is string => typeof e === 'string'))
        ? normalizeExtensions(extensions)
        : d.allowedExtensions,
    maxDownloadSizeMb: Math.max(1, readNumber(value, 'maxDownloadSizeMb', d.maxDownloadSizeMb)),
    maxUploadSizeMb: Math.max(1, readNumber(value, 'maxUploadSizeMb', d.maxUploadSizeMb)),
    cacheEnabled: readBoolean(value, 'cacheEnabled', d.cacheEnabled),
    cacheTtlSeconds: clampCacheTtlMs(readNumber(value, 'cacheTtlSeconds', d.cacheTtlSeconds) * 1000) / 1000,
    backupRoot: normalizeRemotePath(readString(value, 'backupRoot', d.backupRoot)),
    transferConcurrency: clampInt(
      readNumber(value, 'transferConcurrency', d.transferConcurrency),
      MIN_TRANSFER_CONCURRENCY,
      MAX_TRANSFER_CONCURRENCY
    ),
    maxJobItems: Math.max(1, Math.floor(readNumber(value, 'maxJobItems', d.maxJobItems))),
    autoBackups: Array.isArray(rules)
      ? rules.map(parseRule).filter((r): r is AutoBackupRule => r !== null)
      : d.autoBackups,
  };
}

export function parseUserSettings(value: unknown): UserSettings {
  if (!isRecord(value)) return {};
  const result: {
    serverUrl?: string;
    username?: string;
    password?: string;
    token?: string;
    pageSize?: number;
  } = {};
  for (const key of ['serverUrl', 'username', 'password', 'token'] as const) {
    const raw = value[key];
    if (typeof raw === 'string') result[key] = raw;
  }
  const pageSize = value['pageSize'];
  if (typeof pageSize === 'number' && Number.isFinite(pageSize)) {
    result.pageSize = clampPageSize(pageSize);
  }
  return result;
}

function isSftpUrl(url: string): boolean {
  return /^sftp:\/\//i.test(url);
}

function mask(value: string): string {
  return value.length > 0 ? '***' : '';
}

/**
 * Persists one shared settings record plus one record per user. User writes
 * only ever touch that user's file.
 */
export class SettingsStore {
  private readonly sharedPath: string;
  private readonly usersDir: string;
  private shared: SharedSettings;
  private readonly users = new Map<string, UserSettings>();

  public constructor(dataDir: string, seed: Partial<SharedSettings> = {}) {
    this.sharedPath = path.join(dataDir, 'settings.json');
    this.usersDir = path.join(dataDir, 'users');
    const stored = readJsonFile(this.sharedPath);
    if (stored === null) {
      this.shared = parseSharedSettings({ ...DEFAULT_SHARED_SETTINGS, ...seed });
    } else {
      this.shared = parseSharedSettings(stored);
    }
  }

  public getShared(): SharedSettings {
    return this.shared;
  }

  public updateShared(patch: Partial<SharedSettings>): SharedSettings {
    this.shared = parseSharedSettings({ ...this.shared, ...patch });
    writeJsonFileAtomic(this.sharedPath, this.shared, { backup: true });
    return this.shared;
  }

  public getUser(userId: string): UserSettings {
    const cached = this.users.get(userId);
    if (cached) return cached;
    const loaded = parseUserSettings(readJsonFile(this.userPath(userId)));
    this.users.set(userId, loaded);
    return loaded;
  }

  /** Validates and stores one user setting. Credential keys are refused in global mode. */
  public setUserValue(userId: string, key: string, rawValue: string): UserSettings {
    const settingKey = USER_SETTING_KEYS.find((k) => k === key);
    if (!settingKey) {
      throw new InvalidSettingError(`Unknown setting "${key}". Valid settings: ${USER_SETTING_KEYS.join(', ')}`);
    }
    if (!this.shared.requireUserAuth && settingKey !== 'pageSize') {
      throw new InvalidSettingError('Credentials are shared in global mode and cannot be set per user');
    }
    const current = this.getUser(userId);
    let next: UserSettings;
    if (settingKey === 'pageSize') {
      const parsed = Number(rawValue);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 100) {
        throw new InvalidSettingError('pageSize must be an integer between 1 and 100');
      }
      next = { ...current, pageSize: parsed };
    } else if (settingKey === 'serverUrl') {
      const trimmed = rawValue.trim().replace(/\/+$/, '');
      if (!/^(https?|sftp):\/\/[^\s]+$/i.test(trimmed)) {
        throw new InvalidSettingError('serverUrl must be an http(s):// or sftp:// URL');
      }
      if (isSftpUrl(trimmed) && current.token !== undefined && current.token.length > 0) {
        throw new InvalidSettingError(
          'Clear your token before pointing at an sftp:// server; sftp keys are set by the operator'
        );
      }
      next = { ...current, serverUrl: trimmed };
    } else if (settingKey === 'username') {
      next = { ...current, username: rawValue };
    } else if (settingKey === 'password') {
      next = { ...current, password: rawValue };
    } else {
      const effectiveUrl =
        current.serverUrl !== undefined && current.serverUrl.length > 0 ? current.serverUrl : this.shared.serverUrl;
      if (rawValue.length > 0 && isSftpUrl(effectiveUrl)) {
        throw new InvalidSettingError('sftp:// servers take a password; key files are set by the operator');
      }
      next = { ...current, token: rawValue };
    }
    writeJsonFileAtomic(this.userPath(userId), next, { backup: true });
    this.users.set(userId, next);
    return next;
  }

  public clearUser(userId: string): void {
    const filePath = this.userPath(userId);
    if (fs.existsSync(filePath)) fs.rmSync(filePath);
    this.users.delete(userId);
  }

  /** Credentials and limits for `userId`; throws NotConfiguredError without a server URL. */
  public resolveProfile(userId: string): Profile {
    const s = this.shared;
    const { serverUrl, username, password, token } = this.effectiveLogin(userId);
    if (serverUrl.length === 0) {
      throw new NotConfiguredError();
    }
    const credentials: RemoteCredentials = {
      serverUrl,
      username,
      password,
      token,
      publicUrl: s.publicServerUrl.length > 0 ? s.publicServerUrl : serverUrl,
      baseDirectory: s.baseDirectory,
    };
    const pageSize = this.getUser(userId).pageSize ?? s.pageSize;
    return {
      userId,
      mode: s.requireUserAuth ? 'per-user' : 'global',
      credentials,
      credentialId: credentialIdentity(credentials),
      pageSize,
      cacheEnabled: s.cacheEnabled,
      cacheTtlMs: s.cacheTtlSeconds * 1000,
      limits: {
        maxDownloadBytes: s.maxDownloadSizeMb * MB,
        maxUploadBytes: s.maxUploadSizeMb * MB,
        allowedExtensions: s.allowedExtensions,
      },
      backupRoot: s.backupRoot,
      transferConcurrency: s.transferConcurrency,
      maxJobItems: s.maxJobItems,
    };
  }

  /** Display form of the effective settings; secrets are masked. */
  public describeProfile(userId: string): Record<string, string | number | boolean> {
    const s = this.shared;
    const login = this.effectiveLogin(userId);
    return {
      mode: s.requireUserAuth ? 'per-user' : 'global',
      serverUrl: login.serverUrl,
      username: login.username,
      password: mask(login.password),
      token: mask(login.token),
      pageSize: this.getUser(userId).pageSize ?? s.pageSize,
      maxDownloadSizeMb: s.maxDownloadSizeMb,
      maxUploadSizeMb: s.maxUploadSizeMb,
      allowedExtensions: s.allowedExtensions.length > 0 ? s.allowedExtensions.join(',') : '*',
      cacheTtlSeconds: s.cacheEnabled ? s.cacheTtlSeconds : 0,
    };
  }

  /**
   * User values override shared ones. Shared secrets only follow the shared
   * server URL, and an sftp key path only ever comes from the shared settings.
   */
  private effectiveLogin(userId: string): Pick<RemoteCredentials, 'serverUrl' | 'username' | 'password' | 'token'> {
    const s = this.shared;
    const user: UserSettings = s.requireUserAuth ? this.getUser(userId) : {};
    const own = (value: string | undefined): string => value ?? '';
    const ownServer = own(user.serverUrl);
    const sharedServer = ownServer.length === 0 || ownServer === s.serverUrl;
    const pick = (value: string | undefined, fallback: string): string =>
      own(value).length > 0 ? own(value) : sharedServer ? fallback : '';

    const serverUrl = sharedServer ? s.serverUrl : ownServer;
    return {
      serverUrl,
      username: pick(user.username, s.username),
      password: pick(user.password, s.password),
      token: pick(isSftpUrl(serverUrl) ? undefined : user.token, s.token),
    };
  }

  public listAutoBackups(): readonly AutoBackupRule[] {
    return this.shared.autoBackups;
  }

  public getAutoBackup(scope: string): AutoBackupRule | undefined {
    return this.shared.autoBackups.find((r) => r.scope === scope);
  }

  /** Inserts or replaces the rule for `rule.scope`. */
  public setAutoBackup(rule: Omit<AutoBackupRule, 'updatedAt'>): AutoBackupRule {
    const stored: AutoBackupRule = {
      ...rule,
      destination: normalizeRemotePath(rule.destination),
      updatedAt: new Date().toISOString(),
    };
    const others = this.shared.autoBackups.filter((r) => r.scope !== rule.scope);
    this.updateShared({ autoBackups: [...others, stored] });
    return stored;
  }

  private userPath(userId: string): string {
    return path.join(this.usersDir, userRecordName(userId));
  }
}
