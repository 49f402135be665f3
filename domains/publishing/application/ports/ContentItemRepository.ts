import type { ContentItem, ContentStatus } from '../../domain/entities/ContentItem';
import type { AttemptStatus } from '../../domain/entities/PublicationAttempt';

export interface ListContentItemsQuery {
  offset: number;
  limit: number;
  status?: ContentStatus | undefined;
}

/**
* Repository interface for ContentItem persistence.
*/
export interface ContentItemRepository {
  /**
  * Get content item by ID
  * @returns The item, or null when it does not exist
  */
  getById(id: string): Promise<ContentItem | null>;

  /**
  * Insert or update a content item
  */
  save(item: ContentItem): Promise<void>;

  /**
  * List content items, newest first
  */
  list(query: ListContentItemsQuery): Promise<ContentItem[]>;

  /**
  * Delete a content item and, by cascade, its publication attempts
  * @returns false when nothing was deleted
  */
  delete(id: string): Promise<boolean>;

  /**
  * Recompute the item's status from its attempts under a lock on the item,
  * so concurrent recomputes are serialized and the last one sees every
  * committed attempt change.
  *
  * @param reconcile - Pure function from item + attempt statuses to the new item
  * @returns The stored item after reconciliation, or null if it does not exist
  */
  reconcileStatus(
  id: string,
  reconcile: (item: ContentItem, attemptStatuses: readonly AttemptStatus[]) => ContentItem
  ): Promise<ContentItem | null>;
}
