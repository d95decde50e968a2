export * from './clock.js';
export * from './command-router.js';
export * from './commands.js';
export * from './engine.js';
export * from './errors.js';
export * from './json-file.js';
export * from './listing-cache-store.js';
export * from './listing-cache.js';
export * from './lock.js';
export * from './navigation-controller.js';
export * from './pagination.js';
export * from './paths.js';
export * from './session-store.js';
export * from './settings-store.js';
export * from './task-registry.js';
export * from './transfer-jobs.js';
export * from './types.js';
export * from './upload-mode.js';
