/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Fastify 4xx errors (bad JSON, empty body, media type without parser) → same shape.
 * - Unexpected errors (store failures included) → 500 with generic message.
 * - Unknown routes → 404 in the same shape.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, type AppErrorCode } from './errors';
import { UNSUPPORTED_MEDIA_TYPE_MESSAGE } from './content-type';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set(['password', 'token', 'secret', 'authorization']);

function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientStatus(status: number | undefined): status is number {
  return typeof status === 'number' && status >= 400 && status < 500;
}

function codeForClientStatus(status: number): AppErrorCode {
  if (status === 404) return 'NOT_FOUND';
  if (status === 415) return 'UNSUPPORTED_MEDIA_TYPE';
  return 'VALIDATION_ERROR';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Framework-level client errors (body parsing, content-type parsers)
    if (isClientStatus(err.statusCode)) {
      const code = codeForClientStatus(err.statusCode);
      const message = code === 'UNSUPPORTED_MEDIA_TYPE' ? UNSUPPORTED_MEDIA_TYPE_MESSAGE : err.message;

      log.warn('client_error', {
        flow: 'http.error',
        code,
        status: err.statusCode,
        fastifyCode: err.code,
        message: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse(code, message));
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.not_found' });

    return reply
      .status(404)
      .send(buildResponse('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}
