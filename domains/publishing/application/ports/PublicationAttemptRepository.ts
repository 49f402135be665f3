import type { AttemptStatus, PublicationAttempt } from '../../domain/entities/PublicationAttempt';

/**
* Raised when inserting an attempt would give a network a second
* pending/processing attempt for the same content item.
*/
export class ActiveAttemptExistsError extends Error {
  constructor(
  public readonly contentItemId: string,
  cause?: Error
  ) {
  super(`Content item '${contentItemId}' already has an active attempt for one of the networks`, cause ? { cause } : undefined);
  this.name = 'ActiveAttemptExistsError';
  }
}

/**
* Repository interface for PublicationAttempt persistence.
*/
export interface PublicationAttemptRepository {
  /**
  * Insert all attempts atomically
  * @throws ActiveAttemptExistsError when a network already has an active attempt
  */
  createMany(attempts: readonly PublicationAttempt[]): Promise<void>;

  getById(id: string): Promise<PublicationAttempt | null>;

  /**
  * All attempts of a content item, oldest first
  */
  listByContentItem(contentItemId: string): Promise<PublicationAttempt[]>;

  /**
  * Atomic compare-and-set: persist `next` only if the stored attempt is
  * still in `expected` status.
  *
  * @returns true when the row was updated, false when another writer got there first
  */
  transitionStatus(next: PublicationAttempt, expected: AttemptStatus): Promise<boolean>;
}
