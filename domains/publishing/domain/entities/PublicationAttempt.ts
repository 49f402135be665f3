/**
* PublicationAttempt Domain Entity
*
* One network-specific publishing record derived from a content item.
*
* Invariants:
* - publishedAt is set iff status is 'published'
* - errorMessage is only written by a failed outcome; a manual retry keeps the
*   previous message until the next terminal transition replaces or clears it
* - retryCount counts transient failures of the current dispatch
*
* This entity is immutable - all state changes return new instances.
*
* @module domains/publishing/domain/entities/PublicationAttempt
*/

import { InvalidTransitionError } from '../errors';
import type { Network } from '../networks';

export const ATTEMPT_STATUSES = ['pending', 'processing', 'published', 'failed'] as const;

export type AttemptStatus = typeof ATTEMPT_STATUSES[number];

export type AttemptMetadata = Readonly<Record<string, unknown>>;

export interface PublicationAttemptState {
  readonly id: string;
  readonly contentItemId: string;
  readonly network: Network;
  readonly adaptedContent: string | null;
  readonly status: AttemptStatus;
  readonly publishedAt: Date | null;
  readonly errorMessage: string | null;
  readonly metadata: AttemptMetadata;
  readonly retryCount: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export function isAttemptStatus(value: string): value is AttemptStatus {
  return ATTEMPT_STATUSES.some(status => status === value);
}

/** Metadata key holding the image or video URL supplied at publish time */
export const IMAGE_URL_METADATA_KEY = 'image_url';

/**
* PublicationAttempt - Immutable domain entity with state machine validation
*
* State transitions:
*   pending → processing → published
*                       ↘ failed → processing (manual retry)
*/
export class PublicationAttempt {
  private static readonly VALID_TRANSITIONS: Record<AttemptStatus, readonly AttemptStatus[]> = {
  pending: ['processing'],
  processing: ['published', 'failed'],
  published: [], // Terminal state
  failed: ['processing'], // Manual retry
  };

  private constructor(private readonly state: PublicationAttemptState) {}

  static create(
    id: string,
    contentItemId: string,
    network: Network,
    adaptedContent: string,
    now: Date = new Date()
  ): PublicationAttempt {
    if (!id) {
      throw new Error('PublicationAttempt requires an id');
    }
    if (!contentItemId) {
      throw new Error('PublicationAttempt requires a contentItemId');
    }

    return new PublicationAttempt({
      id,
      contentItemId,
      network,
      adaptedContent,
      status: 'pending',
      publishedAt: null,
      errorMessage: null,
      metadata: {},
      retryCount: 0,
      createdAt: now,
      updatedAt: now,
    });
  }

  static reconstitute(state: PublicationAttemptState): PublicationAttempt {
  return new PublicationAttempt(state);
  }

  get id(): string { return this.state.id; }
  get contentItemId(): string { return this.state.contentItemId; }
  get network(): Network { return this.state.network; }
  get adaptedContent(): string | null { return this.state.adaptedContent; }
  get status(): AttemptStatus { return this.state.status; }
  get publishedAt(): Date | null { return this.state.publishedAt; }
  get errorMessage(): string | null { return this.state.errorMessage; }
  get metadata(): AttemptMetadata { return this.state.metadata; }
  get retryCount(): number { return this.state.retryCount; }
  get createdAt(): Date { return this.state.createdAt; }
  get updatedAt(): Date { return this.state.updatedAt; }

  /**
  * Image URL stored at dispatch time, reused by manual retries
  */
  get imageUrl(): string | undefined {
  const value = this.state.metadata[IMAGE_URL_METADATA_KEY];
  return typeof value === 'string' ? value : undefined;
  }

  /**
  * Hand over to the queue - pending → processing
  * @param imageUrl - Stored in metadata when given
  */
  dispatch(imageUrl?: string, now: Date = new Date()): PublicationAttempt {
  this.validateTransition('processing');

  return new PublicationAttempt({
    ...this.state,
    status: 'processing',
    metadata: imageUrl
    ? { ...this.state.metadata, [IMAGE_URL_METADATA_KEY]: imageUrl }
    : this.state.metadata,
    retryCount: 0,
    updatedAt: now,
  });
  }

  /**
  * Record a successful publish with the network's response metadata
  */
  publish(responseMetadata: Record<string, unknown>, now: Date = new Date()): PublicationAttempt {
  this.validateTransition('published');

  return new PublicationAttempt({
    ...this.state,
    status: 'published',
    publishedAt: now,
    errorMessage: null,
    metadata: { ...this.state.metadata, ...responseMetadata },
    updatedAt: now,
  });
  }

  /**
  * Record a permanent failure or exhausted retries
  */
  fail(errorMessage: string, now: Date = new Date()): PublicationAttempt {
  this.validateTransition('failed');

  return new PublicationAttempt({
    ...this.state,
    status: 'failed',
    publishedAt: null,
    errorMessage: errorMessage || 'Unknown publish error',
    updatedAt: now,
  });
  }

  /**
  * Manual retry - failed → processing with a fresh retry budget.
  * The previous error message stays until the next outcome.
  */
  retry(now: Date = new Date()): PublicationAttempt {
  this.validateTransition('processing');

  return new PublicationAttempt({
    ...this.state,
    status: 'processing',
    retryCount: 0,
    updatedAt: now,
  });
  }

  /**
  * Count a transient failure; the attempt stays in processing
  */
  recordTransientFailure(now: Date = new Date()): PublicationAttempt {
  if (this.state.status !== 'processing') {
    throw new InvalidTransitionError('publication attempt', this.state.status, 'processing', []);
  }

  return new PublicationAttempt({
    ...this.state,
    retryCount: this.state.retryCount + 1,
    updatedAt: now,
  });
  }

  /**
  * Compensate a dispatch whose enqueue failed: processing → the status it
  * was dispatched from. Not part of the forward state machine.
  */
  revertDispatch(previous: PublicationAttempt, now: Date = new Date()): PublicationAttempt {
  if (this.state.status !== 'processing' || previous.id !== this.state.id) {
    throw new InvalidTransitionError('publication attempt', this.state.status, previous.status, []);
  }

  return new PublicationAttempt({ ...previous.state, updatedAt: now });
  }

  isTerminal(): boolean {
  return this.state.status === 'published' || this.state.status === 'failed';
  }

  /**
  * Pending or processing attempts block re-adaptation of their network
  */
  isActive(): boolean {
  return this.state.status === 'pending' || this.state.status === 'processing';
  }

  canRetry(): boolean {
  return this.state.status === 'failed';
  }

  toState(): PublicationAttemptState {
  return { ...this.state };
  }

  private validateTransition(to: AttemptStatus): void {
  const allowed = PublicationAttempt.VALID_TRANSITIONS[this.state.status];
  if (!allowed.includes(to)) {
    throw new InvalidTransitionError('publication attempt', this.state.status, to, allowed);
  }
  }
}
