import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'crypto';
import type { IncomingMessage } from 'http';

import { createRequestContext, runWithContext } from '@kernel/request-context';

/**
 * Client-supplied ids are kept only when they are safe to write into logs
 */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

export function sanitizeRequestId(raw: string | string[] | undefined): string | undefined {
  if (typeof raw !== 'string') return undefined;
  return SAFE_REQUEST_ID_RE.test(raw) ? raw : undefined;
}

/**
 * Fastify `genReqId`: reuse a valid X-Request-ID or mint one
 */
export function generateRequestId(req: IncomingMessage): string {
  return sanitizeRequestId(req.headers['x-request-id']) ?? randomUUID();
}

/**
 * Run a route handler inside a request context so every log line and error
 * response carries the request id
 */
export function inRequestContext<T>(req: FastifyRequest, fn: () => Promise<T>): Promise<T> {
  const context = createRequestContext({
    requestId: req.id,
    path: req.routeOptions.url ?? req.url,
    method: req.method,
  });
  return runWithContext(context, fn);
}

/**
 * Echo the request id back on every response
 */
export function registerRequestIdHeader(app: FastifyInstance): void {
  app.addHook('onSend', async (req, reply, payload) => {
    void reply.header('X-Request-ID', req.id);
    return payload;
  });
}
