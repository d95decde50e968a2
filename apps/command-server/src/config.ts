import os from 'node:os';
import path from 'node:path';
import { DEFAULT_UPLOAD_WINDOW_MS, type SharedSettings } from '@chatdrive/session-core';

export interface ServerConfig {
  host: string;
  port: number;
  dataDir: string;
  /** Bearer token for the HTTP surface; null leaves it open. */
  authToken: string | null;
  chatFilesDir: string;
  downloadDir: string;
  uploadWindowMs: number;
  /** 0 disables the autobackup timer. */
  autoBackupIntervalMs: number;
  stagingTtlMs: number;
  /** Shared defaults applied when no settings file exists yet. */
  seed: Partial<SharedSettings>;
}

type Env = Readonly<Record<string, string | undefined>>;

export function expandHome(value: string, homeDir: string = os.homedir()): string {
  if (!value.startsWith('~/')) {
    return value;
  }
  return path.join(homeDir, value.slice(2));
}

function normalizeHost(raw: string | undefined): string {
  const next = (raw ?? '127.0.0.1').trim();
  return next.length > 0 ? next : '127.0.0.1';
}

function normalizePort(raw: string | undefined): number {
  const parsed = raw ? Number(raw) : 9810;
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 65535) return 9810;
  return Math.floor(parsed);
}

function normalizeUploadWindowMs(raw: string | undefined): number {
  const parsed = raw ? Number(raw) : DEFAULT_UPLOAD_WINDOW_MS;
  if (!Number.isFinite(parsed) || parsed < 10_000) return DEFAULT_UPLOAD_WINDOW_MS;
  return Math.floor(parsed);
}

function normalizeAutoBackupIntervalMs(raw: string | undefined): number {
  if (!raw || raw.trim().length === 0) return 0;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return 0;
  return Math.max(60_000, Math.floor(parsed));
}

function normalizeStagingTtlMs(raw: string | undefined): number {
  const parsed = raw ? Number(raw) : 10_000;
  if (!Number.isFinite(parsed) || parsed < 1_000) return 10_000;
  return Math.floor(parsed);
}

function normalizeBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }
  return fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  const trimmed = raw?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

function seedFromEnv(env: Env): Partial<SharedSettings> {
  const seed: {
    serverUrl?: string;
    username?: string;
    password?: string;
    token?: string;
    requireUserAuth?: boolean;
  } = {};
  const serverUrl = nonEmpty(env.CHATDRIVE_DEFAULT_SERVER_URL);
  if (serverUrl) seed.serverUrl = serverUrl.replace(/\/+$/, '');
  const username = nonEmpty(env.CHATDRIVE_DEFAULT_USERNAME);
  if (username) seed.username = username;
  const password = nonEmpty(env.CHATDRIVE_DEFAULT_PASSWORD);
  if (password) seed.password = password;
  const token = nonEmpty(env.CHATDRIVE_DEFAULT_TOKEN);
  if (token) seed.token = token;
  if (env.CHATDRIVE_REQUIRE_USER_AUTH !== undefined) {
    seed.requireUserAuth = normalizeBoolean(env.CHATDRIVE_REQUIRE_USER_AUTH, true);
  }
  return seed;
}

export function loadServerConfigFromEnv(env: Env = process.env): ServerConfig {
  const dataDir = expandHome(env.CHATDRIVE_DATA_DIR ?? '~/.chatdrive');
  return {
    host: normalizeHost(env.HOST),
    port: normalizePort(env.PORT),
    dataDir,
    authToken: nonEmpty(env.CHATDRIVE_AUTH_TOKEN),
    chatFilesDir: expandHome(env.CHATDRIVE_CHAT_FILES_DIR ?? path.join(dataDir, 'chat-files')),
    downloadDir: expandHome(env.CHATDRIVE_DOWNLOAD_DIR ?? path.join(dataDir, 'downloads')),
    uploadWindowMs: normalizeUploadWindowMs(env.CHATDRIVE_UPLOAD_WINDOW_MS),
    autoBackupIntervalMs: normalizeAutoBackupIntervalMs(env.CHATDRIVE_AUTOBACKUP_INTERVAL_MS),
    stagingTtlMs: normalizeStagingTtlMs(env.CHATDRIVE_STAGING_TTL_MS),
    seed: seedFromEnv(env),
  };
}
