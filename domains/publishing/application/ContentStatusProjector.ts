import { getLogger, toError } from '@kernel/logger';

import type { ContentItem } from '../domain/entities/ContentItem';
import type { ContentItemRepository } from './ports/ContentItemRepository';

const logger = getLogger('publishing:status-projector');

/**
* Keeps a content item's status in line with its publication attempts.
*
* Called after every attempt state change. The recompute runs inside the
* repository under a lock on the item, never as a read-then-write here.
*
* The stored status is a projection: readers derive the status from the
* attempt rows they load, and the next refresh of the item repairs a write
* that was lost.
*/
export class ContentStatusProjector {
  constructor(private readonly items: ContentItemRepository) {}

  /**
  * @returns The reconciled item, or null if it was deleted meanwhile
  */
  async refresh(contentItemId: string): Promise<ContentItem | null> {
  let previous: ContentItem['status'] | undefined;

  const item = await this.items.reconcileStatus(contentItemId, (current, attemptStatuses) => {
    previous = current.status;
    return current.reconcile(attemptStatuses);
  });

  if (!item) {
    logger.warn('Content item vanished before status refresh', { contentItemId });
    return null;
  }

  if (previous !== undefined && previous !== item.status) {
    logger.info('Content status changed', { contentItemId, from: previous, to: item.status });
  }

  return item;
  }

  /**
  * Refresh after an attempt change that is already committed. A failure is
  * logged rather than thrown so it cannot mask the caller's own outcome.
  */
  async refreshAfterWrite(contentItemId: string): Promise<void> {
  try {
    await this.refresh(contentItemId);
  } catch (error) {
    logger.error('Content status refresh failed', toError(error), { contentItemId });
  }
  }
}
