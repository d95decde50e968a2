export * from './openlist-client.js';
export * from './router.js';
export * from './sftp-file-service.js';
