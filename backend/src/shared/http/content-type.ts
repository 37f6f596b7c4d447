/**
 * backend/src/shared/http/content-type.ts
 *
 * WHY:
 * - Endpoints that take a body only accept JSON; anything else is a 415.
 * - Fastify rejects media types it has no parser for, but it happily parses
 *   text/plain and lets a body-less request through, so handlers check too.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export const JSON_MEDIA_TYPE = 'application/json';

export const UNSUPPORTED_MEDIA_TYPE_MESSAGE = `Content-Type must be ${JSON_MEDIA_TYPE}`;

/**
 * Media type of a Content-Type header, lowercased and without parameters
 * ("Application/JSON; charset=utf-8" -> "application/json").
 */
export function mediaTypeOf(header: string | undefined): string | null {
  if (!header) return null;

  const [type] = header.split(';');
  const trimmed = type?.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

export function assertJsonContentType(req: FastifyRequest): void {
  const received = mediaTypeOf(req.headers['content-type']);
  if (received === JSON_MEDIA_TYPE) return;

  throw AppError.unsupportedMediaType(UNSUPPORTED_MEDIA_TYPE_MESSAGE, {
    contentType: received,
  });
}
