import { createHmac, timingSafeEqual } from 'node:crypto';
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import {
  ChatDriveError,
  toPartialFailure,
  type ChatDrive,
  type ChatDriveErrorCode,
  type Logger,
  type SessionIdentity,
  type SettingsStore,
} from '@chatdrive/session-core';
import type { DownloadStager } from './download-stager.js';
import { fastifyLogger } from './logger.js';

/** Attachments arrive base64 encoded; 200 MB of payload plus encoding overhead. */
const DEFAULT_BODY_LIMIT_BYTES = 280 * 1024 * 1024;

const ALLOWED_ORIGINS = [
  /^https?:\/\/localhost(:\d+)?$/,
  /^https?:\/\/127\.0\.0\.1(:\d+)?$/,
  /^https?:\/\/\[::1\](:\d+)?$/,
];

const STATUS_BY_CODE: Readonly<Record<ChatDriveErrorCode, number>> = {
  invalid_command: 400,
  invalid_target: 400,
  index_out_of_range: 400,
  no_parent: 400,
  no_active_listing: 400,
  not_in_upload_mode: 400,
  size_limit_exceeded: 400,
  extension_not_allowed: 400,
  invalid_setting: 400,
  auth_error: 401,
  not_found: 404,
  job_not_found: 404,
  job_in_progress: 409,
  not_configured: 412,
  connection_error: 502,
  remote_error: 502,
  partial_failure: 500,
};

export interface ServerServices {
  readonly drive: ChatDrive;
  readonly stager: DownloadStager;
  readonly settings: SettingsStore;
  /** Runs when the server closes, after the session engine and stager have stopped. */
  readonly dispose?: () => void;
}

export interface BuildServerOptions {
  /** Bearer token every route except /health requires; null leaves the API open. */
  readonly authToken: string | null;
  readonly logger?: boolean;
  readonly bodyLimitBytes?: number;
  /** Builds the core services once the server's logger exists. */
  readonly services: (logger: Logger) => ServerServices;
}

export interface BuiltServer {
  readonly app: FastifyInstance;
  readonly services: ServerServices;
}

interface CommandBody {
  readonly identity: SessionIdentity;
  readonly text: string;
}

interface AttachmentBody {
  readonly identity: SessionIdentity;
  readonly name: string;
  readonly kind: 'file' | 'image';
  readonly content: Buffer;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

function readIdentity(body: Record<string, unknown>): SessionIdentity | null {
  const userId = nonEmptyString(body['userId']);
  const scope = nonEmptyString(body['scope']);
  if (userId === null || scope === null) return null;
  return { userId, scope };
}

function parseCommandBody(value: unknown): CommandBody | null {
  if (!isRecord(value)) return null;
  const identity = readIdentity(value);
  const text = nonEmptyString(value['text']);
  if (identity === null || text === null) return null;
  return { identity, text };
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function parseAttachmentBody(value: unknown): AttachmentBody | null {
  if (!isRecord(value)) return null;
  const identity = readIdentity(value);
  const name = nonEmptyString(value['name']);
  const kind = value['kind'] ?? 'file';
  const encoded = value['contentBase64'];
  if (identity === null || name === null) return null;
  if (kind !== 'file' && kind !== 'image') return null;
  if (typeof encoded !== 'string' || !BASE64_RE.test(encoded)) return null;
  return { identity, name, kind, content: Buffer.from(encoded, 'base64') };
}

function parseBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) {
    return null;
  }

  const spaceIndex = header.indexOf(' ');
  if (spaceIndex === -1) {
    return null;
  }

  const scheme = header.slice(0, spaceIndex);
  const token = header.slice(spaceIndex + 1);
  if (scheme !== 'Bearer' || token.length === 0) {
    return null;
  }

  return token;
}

const HMAC_KEY = Buffer.from('chatdrive-constant-time-compare');

function constantTimeEquals(a: string, b: string): boolean {
  const digestA = createHmac('sha256', HMAC_KEY).update(a).digest();
  const digestB = createHmac('sha256', HMAC_KEY).update(b).digest();
  return timingSafeEqual(digestA, digestB);
}

export async function buildServer(options: BuildServerOptions): Promise<BuiltServer> {
  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: options.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES,
  });

  await app.register(cors, {
    origin: (origin, callback) => {
      if (!origin || ALLOWED_ORIGINS.some((pattern) => pattern.test(origin))) {
        callback(null, true);
      } else {
        callback(new Error('CORS: origin not allowed'), false);
      }
    },
  });

  const services = options.services(fastifyLogger(app.log));
  const { drive, stager, settings } = services;
  const authToken = options.authToken;

  app.addHook('onClose', async () => {
    drive.shutdown();
    await stager.close();
    services.dispose?.();
  });

  app.addHook('onRequest', async (request, reply) => {
    if (authToken === null || request.url.split('?')[0] === '/health') {
      return;
    }
    const requestToken = parseBearerToken(request);
    if (requestToken === null || !constantTimeEquals(requestToken, authToken)) {
      return reply.code(401).send({ error: 'unauthorized' });
    }
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ChatDriveError) {
      const statusCode = STATUS_BY_CODE[error.code];
      if (statusCode >= 500) {
        app.log.error({ err: error }, error.message);
      } else {
        app.log.info({ code: error.code }, error.message);
      }
      void reply.code(statusCode).send({ error: error.code, message: error.message, details: error.details });
      return;
    }
    app.log.error(error);
    const statusCode = error.statusCode ?? 500;
    void reply.code(statusCode).send({
      error: statusCode >= 500 ? 'internal_server_error' : 'request_error',
      message: statusCode >= 500 ? 'An unexpected error occurred.' : error.message,
    });
  });

  app.get('/health', async () => ({
    ok: true,
    sessions: drive.sessions.size,
    cacheEntries: drive.cache.size,
  }));

  app.post('/commands', async (request, reply) => {
    const body = parseCommandBody(request.body);
    if (!body) {
      return reply.code(400).send({ error: 'invalid_body', message: 'Expected { userId, scope, text }.' });
    }
    const result = await drive.handleText(body.identity, body.text);
    if (result.kind !== 'retrieval') {
      return result;
    }
    const profile = settings.resolveProfile(body.identity.userId);
    const staged = await stager.stage(result.retrieval, profile.credentials);
    return { ...result, staged };
  });

  app.post('/attachments', async (request, reply) => {
    const body = parseAttachmentBody(request.body);
    if (!body) {
      return reply
        .code(400)
        .send({ error: 'invalid_body', message: 'Expected { userId, scope, name, kind, contentBase64 }.' });
    }
    const content = body.content;
    return drive.handleAttachment(body.identity, {
      name: body.name,
      kind: body.kind,
      size: content.byteLength,
      read: async () => content,
    });
  });

  app.get<{ Params: { jobId: string } }>('/jobs/:jobId', async (request) => {
    const job = drive.jobs.getJob(request.params.jobId);
    const failure = toPartialFailure(job);
    return {
      job,
      failure: failure ? { message: failure.message, failures: failure.failures } : null,
    };
  });

  app.post<{ Params: { jobId: string } }>('/jobs/:jobId/cancel', async (request) => {
    const jobId = request.params.jobId;
    drive.jobs.getJob(jobId);
    return { jobId, cancelled: drive.jobs.cancelJob(jobId) };
  });

  return { app, services };
}
