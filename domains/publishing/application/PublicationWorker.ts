import { setTimeout as delay } from 'timers/promises';

import { getLogger } from '@kernel/logger';

import type { PublicationAttempt } from '../domain/entities/PublicationAttempt';
import type { ContentStatusProjector } from './ContentStatusProjector';
import type { PublisherRegistry } from './PublisherRegistry';
import { toPublishFailure, type PublishFailure, type PublishResult } from './ports/NetworkPublisher';
import type { PublicationAttemptRepository } from './ports/PublicationAttemptRepository';
import type { PublicationJob } from './ports/PublicationQueue';

const logger = getLogger('publishing:worker');

// ============================================================================
// Type Definitions
// ============================================================================

export interface PublicationWorkerOptions {
  /** Transient failures retried after the first call */
  maxRetries: number;
  /** Fixed backoff between calls */
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export type ProcessOutcome = 'published' | 'failed' | 'skipped';

export interface ProcessResult {
  outcome: ProcessOutcome;
  /** Publisher calls made by this run */
  calls: number;
  error?: string;
}

type CallResult =
  | { ok: true; result: PublishResult }
  | { ok: false; failure: PublishFailure };

// ============================================================================
// Publication Worker
// ============================================================================

/**
* Executes one unit of work: publish a single attempt to its network.
*
* The attempt stays in processing across transient retries; only the final
* outcome moves it to published or failed. Deliveries for attempts that are
* not in processing are acknowledged without doing anything.
*/
export class PublicationWorker {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
  private readonly attempts: PublicationAttemptRepository,
  private readonly publishers: PublisherRegistry,
  private readonly projector: ContentStatusProjector,
  private readonly options: PublicationWorkerOptions
  ) {
  this.sleep = options.sleep ?? (ms => delay(ms));
  }

  async process(job: PublicationJob): Promise<ProcessResult> {
  const attempt = await this.attempts.getById(job.attemptId);
  if (!attempt) {
    logger.warn('Publication attempt not found, dropping job', { attemptId: job.attemptId });
    return { outcome: 'skipped', calls: 0 };
  }
  if (attempt.status !== 'processing') {
    logger.info('Duplicate delivery ignored', { attemptId: attempt.id, status: attempt.status });
    if (attempt.isTerminal()) {
    // Redelivery after a crash between the outcome write and the refresh
    await this.projector.refreshAfterWrite(attempt.contentItemId);
    }
    return { outcome: 'skipped', calls: 0 };
  }

  const log = logger.child({ attemptId: attempt.id, network: attempt.network });

  const publisher = this.publishers.get(attempt.network);
  if (!publisher) {
    const message = `No publisher configured for ${attempt.network}`;
    log.error(message);
    return this.finish(attempt, attempt.fail(message), 0, message);
  }

  const request = {
    content: job.content,
    imageUrl: job.imageUrl ?? attempt.imageUrl,
  };

  let current = attempt;
  let calls = 0;

  for (;;) {
    calls++;
    const call = await this.call(() => publisher.publish(request));

    if (call.ok) {
    log.info('Published', { calls });
    return this.finish(current, current.publish(call.result.metadata), calls);
    }

    const { failure } = call;
    if (!failure.retryable) {
    log.warn('Permanent publish failure', { error: failure.message, status: failure.status });
    return this.finish(current, current.fail(failure.message), calls, failure.message);
    }

    if (current.retryCount >= this.options.maxRetries) {
    log.warn('Retries exhausted', { error: failure.message, retries: current.retryCount });
    return this.finish(current, current.fail(failure.message), calls, failure.message);
    }

    const next = current.recordTransientFailure();
    if (!(await this.attempts.transitionStatus(next, 'processing'))) {
    log.warn('Attempt left processing during retries, abandoning job');
    return { outcome: 'skipped', calls };
    }
    current = next;

    log.info('Transient publish failure, retrying', {
    error: failure.message,
    retry: current.retryCount,
    maxRetries: this.options.maxRetries,
    delayMs: this.options.retryDelayMs,
    });
    await this.sleep(this.options.retryDelayMs);
  }
  }

  private async call(fn: () => Promise<PublishResult>): Promise<CallResult> {
  try {
    return { ok: true, result: await fn() };
  } catch (error) {
    return { ok: false, failure: toPublishFailure(error) };
  }
  }

  /**
  * Persist a terminal outcome and recompute the content status
  */
  private async finish(
  current: PublicationAttempt,
  next: PublicationAttempt,
  calls: number,
  error?: string
  ): Promise<ProcessResult> {
  const saved = await this.attempts.transitionStatus(next, current.status);
  if (!saved) {
    logger.warn('Attempt changed before outcome was recorded', { attemptId: current.id });
    return { outcome: 'skipped', calls };
  }

  await this.projector.refreshAfterWrite(current.contentItemId);

  const outcome: ProcessOutcome = next.status === 'published' ? 'published' : 'failed';
  return error === undefined ? { outcome, calls } : { outcome, calls, error };
  }
}
