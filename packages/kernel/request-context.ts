import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Carries the id of the HTTP request or BullMQ job being handled through async
* calls so log lines and error responses correlate.
*/

export type ContextSource = 'http' | 'job';

export interface RequestContext {
  /** HTTP request id, or BullMQ job id for worker jobs */
  requestId: string;
  traceId?: string | undefined;
  source: ContextSource;
  startTime: number;
  /** Route pattern, or `job:<name>` */
  path?: string | undefined;
  method?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
* Build a context; ids default to fresh UUIDs and the source to 'http'
*/
export function createRequestContext(options?: Partial<Omit<RequestContext, 'startTime'>>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    traceId: options?.traceId || randomUUID(),
    source: options?.source ?? 'http',
    startTime: Date.now(),
    path: options?.path,
    method: options?.method,
  };
}

/**
* Context for one BullMQ job. Jobs without an id (never the case for queued
* jobs) get a generated one.
*/
export function createJobContext(jobId: string | undefined, jobName: string): RequestContext {
  return createRequestContext({
    requestId: jobId || `job-${randomUUID()}`,
    source: 'job',
    path: `job:${jobName}`,
    method: 'WORKER',
  });
}

/**
* Request id of the active context, or a fresh UUID outside one
*/
export function getRequestId(): string {
  return getRequestContext()?.requestId || randomUUID();
}
