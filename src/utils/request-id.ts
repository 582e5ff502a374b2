import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Extract request ID from incoming headers or generate a new one.
 * Used as Fastify's genReqId, so request.id carries it afterwards.
 */
export function getOrGenerateRequestId(request: { headers: IncomingHttpHeaders }): string {
  const incomingId = request.headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string' && incomingId.trim().length > 0) {
    return incomingId.trim();
  }

  return generateRequestId();
}
