import { randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { FastifyRequest } from 'fastify';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Take the incoming X-Request-Id header or generate a new one.
 * Wired as Fastify's `genReqId`, so `request.id` carries the result.
 */
export function getOrGenerateRequestId(raw: Pick<IncomingMessage, 'headers'>): string {
  const incomingId = raw.headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string' && incomingId.trim().length > 0) {
    return incomingId.trim();
  }

  return generateRequestId();
}

export function getRequestId(request?: Pick<FastifyRequest, 'id'>): string {
  if (!request) {
    return 'unknown';
  }
  return request.id || 'unknown';
}
