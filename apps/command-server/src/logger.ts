import type { FastifyBaseLogger } from 'fastify';
import type { Logger } from '@chatdrive/session-core';

/** Routes core log events into the server's pino logger. */
export function fastifyLogger(log: FastifyBaseLogger): Logger {
  return {
    info: (message, context) => log.info(context ?? {}, message),
    warn: (message, context) => log.warn(context ?? {}, message),
    error: (message, context) => log.error(context ?? {}, message),
  };
}
