/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId so we can trace a full request.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 *
 * RULES:
 * - These methods never throw: a transport that fails while writing is
 *   reported to stderr and the request carries on.
 */

import type { FastifyRequest } from 'fastify';
import { logger, reportLoggerFailure } from './logger';

type LogMeta = Record<string, unknown>;
type LogLevel = 'info' | 'warn' | 'error';

export function withRequestContext(req: FastifyRequest) {
  const base = {
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,
  };

  const write = (level: LogLevel, msg: string, meta: LogMeta) => {
    try {
      logger.log(level, msg, { ...base, ...meta });
    } catch (err) {
      reportLoggerFailure(err);
    }
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => write('info', msg, meta),
    warn: (msg: string, meta: LogMeta = {}) => write('warn', msg, meta),
    error: (msg: string, meta: LogMeta = {}) => write('error', msg, meta),
  };
}
