import fs from 'node:fs';
import path from 'node:path';
import { createChatDrive, SettingsStore } from '@chatdrive/session-core';
import { createRemoteFileService } from '@chatdrive/remote-client';
import { startAutoBackupTimer } from './autobackup-timer.js';
import { DirectoryChatFileStore } from './chat-file-store.js';
import { loadServerConfigFromEnv } from './config.js';
import { DownloadStager } from './download-stager.js';
import { fastifyLogger } from './logger.js';
import { buildServer } from './server.js';

const config = loadServerConfigFromEnv();
fs.mkdirSync(config.dataDir, { recursive: true, mode: 0o700 });

const settings = new SettingsStore(config.dataDir, config.seed);
const { app, services } = await buildServer({
  authToken: config.authToken,
  services: (logger) => {
    const remote = createRemoteFileService({ openList: { logger }, sftp: { logger } });
    const drive = createChatDrive({
      settings,
      remote,
      chatFiles: new DirectoryChatFileStore(config.chatFilesDir),
      cacheDir: path.join(config.dataDir, 'cache'),
      logger,
      uploadWindowMs: config.uploadWindowMs,
      parse: { prefix: 'drive' },
      onJobEvent: (event) => logger.info(event.kind, { jobId: event.job.id, status: event.job.status }),
    });
    const stager = new DownloadStager({ remote, directory: config.downloadDir, ttlMs: config.stagingTtlMs, logger });
    return { drive, stager, settings, dispose: () => remote.close() };
  },
});

if (config.authToken === null) {
  app.log.warn('CHATDRIVE_AUTH_TOKEN is not set; the command API accepts unauthenticated requests.');
}

const stopAutoBackups =
  config.autoBackupIntervalMs > 0
    ? startAutoBackupTimer(services.drive.jobs, config.autoBackupIntervalMs, undefined, fastifyLogger(app.log))
    : () => undefined;

async function shutdown(signal: string): Promise<void> {
  app.log.info(`Received ${signal}, shutting down gracefully…`);
  stopAutoBackups();
  await app.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  app.log.error({ err: error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  app.log.error({ err: reason }, 'Unhandled promise rejection');
});

app.listen({ port: config.port, host: config.host }).catch((error: unknown) => {
  app.log.error(error);
  process.exit(1);
});
