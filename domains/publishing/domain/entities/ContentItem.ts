/**
* ContentItem Domain Entity
*
* The source material (title + body) that gets adapted and published per
* network. Its status is never set directly by workers: it is derived from
* the statuses of its publication attempts (see deriveContentStatus).
*
* This entity is immutable - all state changes return new instances.
*
* @module domains/publishing/domain/entities/ContentItem
*/

import { InvalidTransitionError } from '../errors';
import type { AttemptStatus } from './PublicationAttempt';

export const CONTENT_STATUSES = ['draft', 'processing', 'published', 'failed'] as const;

export type ContentStatus = typeof CONTENT_STATUSES[number];

export interface ContentItemState {
  readonly id: string;
  readonly title: string;
  readonly body: string;
  readonly status: ContentStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export function isContentStatus(value: string): value is ContentStatus {
  return CONTENT_STATUSES.some(status => status === value);
}

/**
* Derive the content status from the multiset of attempt statuses.
*
* - no attempts: unchanged
* - anything pending or processing: processing
* - otherwise at least one published: published
* - otherwise (all failed): failed
*/
export function deriveContentStatus(
  current: ContentStatus,
  attemptStatuses: readonly AttemptStatus[]
): ContentStatus {
  if (attemptStatuses.length === 0) {
  return current;
  }
  if (attemptStatuses.some(s => s === 'pending' || s === 'processing')) {
  return 'processing';
  }
  if (attemptStatuses.some(s => s === 'published')) {
  return 'published';
  }
  return 'failed';
}

/**
* ContentItem - Immutable domain entity
*
* State transitions:
*   draft → processing → published
*                    ↘ failed
*   published | failed → processing (re-adaptation or manual retry)
*/
export class ContentItem {
  static readonly VALIDATION = {
  MAX_TITLE_LENGTH: 500,
  MAX_BODY_LENGTH: 100000,
  } as const;

  private static readonly VALID_TRANSITIONS: Record<ContentStatus, readonly ContentStatus[]> = {
  draft: ['processing'],
  processing: ['published', 'failed'],
  published: ['processing'],
  failed: ['processing'],
  };

  private constructor(private readonly state: ContentItemState) {}

  /**
  * Create a new draft
  * @throws Error when title or body is empty or too long
  */
  static create(id: string, title: string, body: string, now: Date = new Date()): ContentItem {
  const trimmedTitle = title.trim();
  const trimmedBody = body.trim();
  if (!id) {
    throw new Error('ContentItem requires an id');
  }
  if (trimmedTitle.length === 0 || trimmedTitle.length > ContentItem.VALIDATION.MAX_TITLE_LENGTH) {
    throw new Error(`Title must be between 1 and ${ContentItem.VALIDATION.MAX_TITLE_LENGTH} characters`);
  }
  if (trimmedBody.length === 0 || trimmedBody.length > ContentItem.VALIDATION.MAX_BODY_LENGTH) {
    throw new Error(`Body must be between 1 and ${ContentItem.VALIDATION.MAX_BODY_LENGTH} characters`);
  }

  return new ContentItem({
    id,
    title: trimmedTitle,
    body: trimmedBody,
    status: 'draft',
    createdAt: now,
    updatedAt: now,
  });
  }

  static reconstitute(state: ContentItemState): ContentItem {
  return new ContentItem(state);
  }

  get id(): string { return this.state.id; }
  get title(): string { return this.state.title; }
  get body(): string { return this.state.body; }
  get status(): ContentStatus { return this.state.status; }
  get createdAt(): Date { return this.state.createdAt; }
  get updatedAt(): Date { return this.state.updatedAt; }

  /**
  * Bring the status in line with the given attempt statuses.
  * Returns the same instance when nothing changes. A jump that skips
  * 'processing' (e.g. draft → published after a missed recompute) goes
  * through it.
  */
  reconcile(attemptStatuses: readonly AttemptStatus[], now: Date = new Date()): ContentItem {
  const target = deriveContentStatus(this.state.status, attemptStatuses);
  if (target === this.state.status) {
    return this;
  }
  if (ContentItem.VALID_TRANSITIONS[this.state.status].includes(target)) {
    return this.transitionTo(target, now);
  }
  return this.transitionTo('processing', now).transitionTo(target, now);
  }

  toState(): ContentItemState {
  return { ...this.state };
  }

  private transitionTo(to: ContentStatus, now: Date): ContentItem {
  const allowed = ContentItem.VALID_TRANSITIONS[this.state.status];
  if (!allowed.includes(to)) {
    throw new InvalidTransitionError('content item', this.state.status, to, allowed);
  }
  return new ContentItem({ ...this.state, status: to, updatedAt: now });
  }
}
