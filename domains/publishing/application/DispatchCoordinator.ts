import { ConflictError, NotFoundError } from '@errors';
import { getLogger, toError } from '@kernel/logger';

import type { PublicationAttempt } from '../domain/entities/PublicationAttempt';
import { DispatchError } from '../domain/errors';
import type { Network } from '../domain/networks';
import type { ContentStatusProjector } from './ContentStatusProjector';
import type { ContentItemRepository } from './ports/ContentItemRepository';
import {
  ActiveAttemptExistsError,
  type PublicationAttemptRepository,
} from './ports/PublicationAttemptRepository';
import type { PublicationQueue } from './ports/PublicationQueue';

const logger = getLogger('publishing:dispatch');

// ============================================================================
// Type Definitions
// ============================================================================

export interface DispatchAck {
  publicationId: string;
  network: Network;
  status: 'enqueued';
  /** Queue handle for tracing the unit of work */
  taskId: string;
}

export interface PublishSummary {
  contentItemId: string;
  totalPublications: number;
  results: DispatchAck[];
}

// ============================================================================
// Dispatch Coordinator
// ============================================================================

/**
* Fan-out of pending attempts to the publication queue.
*
* Each attempt moves pending → processing through a compare-and-set before
* it is enqueued, so concurrent publish calls never dispatch it twice. The
* coordinator returns once everything is enqueued; outcomes are only visible
* through the status aggregator.
*/
export class DispatchCoordinator {
  constructor(
  private readonly items: ContentItemRepository,
  private readonly attempts: PublicationAttemptRepository,
  private readonly queue: PublicationQueue,
  private readonly projector: ContentStatusProjector
  ) {}

  /**
  * Dispatch every pending attempt of a content item
  *
  * @param imageUrl - Passed to each unit of work and stored for manual retries
  * @throws NotFoundError when the content item does not exist
  * @throws DispatchError when an enqueue fails; that attempt is back in pending
  */
  async publish(contentItemId: string, imageUrl?: string): Promise<PublishSummary> {
  const item = await this.items.getById(contentItemId);
  if (!item) {
    throw NotFoundError.content();
  }

  const pending = (await this.attempts.listByContentItem(contentItemId))
    .filter(attempt => attempt.status === 'pending');

  const results: DispatchAck[] = [];
  try {
    for (const attempt of pending) {
    const ack = await this.dispatchOne(attempt, attempt.dispatch(imageUrl), imageUrl);
    if (ack) {
      results.push(ack);
    }
    }
  } finally {
    // Also runs with nothing dispatched, which repairs a status whose last refresh was lost
    await this.projector.refreshAfterWrite(contentItemId);
  }

  logger.info('Publications dispatched', {
    contentItemId,
    pending: pending.length,
    enqueued: results.length,
  });

  return { contentItemId, totalPublications: results.length, results };
  }

  /**
  * Manual retry of one failed attempt
  *
  * @throws NotFoundError when the attempt does not exist
  * @throws ConflictError when the attempt is not failed
  * @throws DispatchError when the enqueue fails; the attempt stays failed
  */
  async retry(attemptId: string): Promise<DispatchAck> {
  const attempt = await this.attempts.getById(attemptId);
  if (!attempt) {
    throw NotFoundError.publication();
  }
  if (!attempt.canRetry()) {
    throw new ConflictError(`Only failed publications can be retried (current status: ${attempt.status})`, {
    status: attempt.status,
    });
  }

  const ack = await this.dispatchOne(attempt, attempt.retry(), attempt.imageUrl);
  if (!ack) {
    throw new ConflictError('Publication was retried concurrently');
  }

  await this.projector.refreshAfterWrite(attempt.contentItemId);
  logger.info('Publication retry dispatched', { attemptId, network: attempt.network });
  return ack;
  }

  /**
  * CAS the attempt into processing, then enqueue it. A failed enqueue puts
  * the attempt back where it was.
  *
  * @returns null when another dispatcher moved the attempt first
  */
  private async dispatchOne(
  current: PublicationAttempt,
  dispatched: PublicationAttempt,
  imageUrl: string | undefined
  ): Promise<DispatchAck | null> {
  let claimed: boolean;
  try {
    claimed = await this.attempts.transitionStatus(dispatched, current.status);
  } catch (error) {
    if (error instanceof ActiveAttemptExistsError) {
    throw new ConflictError(`A newer ${current.network} publication is already in progress`, {
      network: current.network,
    });
    }
    throw error;
  }
  if (!claimed) {
    logger.debug('Attempt already claimed by another dispatcher', { attemptId: current.id });
    return null;
  }

  let taskId: string;
  try {
    taskId = await this.queue.enqueue({
    attemptId: dispatched.id,
    network: dispatched.network,
    content: dispatched.adaptedContent ?? '',
    imageUrl,
    });
  } catch (error) {
    const cause = toError(error);
    logger.error('Enqueue failed, rolling back dispatch', cause, { attemptId: current.id });
    const reverted = await this.attempts.transitionStatus(dispatched.revertDispatch(current), 'processing');
    if (!reverted) {
    logger.warn('Dispatch rollback found the attempt already moved', { attemptId: current.id });
    }
    throw new DispatchError(current.id, cause);
  }

  return {
    publicationId: dispatched.id,
    network: dispatched.network,
    status: 'enqueued',
    taskId,
  };
  }
}
