import { NotFoundError } from '@errors';

import { deriveContentStatus, type ContentStatus } from '../domain/entities/ContentItem';
import type { AttemptMetadata, AttemptStatus } from '../domain/entities/PublicationAttempt';
import type { Network } from '../domain/networks';
import type { ContentItemRepository } from './ports/ContentItemRepository';
import type { PublicationAttemptRepository } from './ports/PublicationAttemptRepository';

export interface PublicationSummary {
  id: string;
  network: Network;
  status: AttemptStatus;
  publishedAt: Date | null;
  errorMessage: string | null;
  retryCount: number;
  metadata: AttemptMetadata;
}

export interface StatusSummary {
  postId: string;
  postStatus: ContentStatus;
  totalPublications: number;
  byStatus: Record<AttemptStatus, number>;
  publications: PublicationSummary[];
}

/**
* Point-in-time summary polled by clients. Computed from the stored rows on
* every call; nothing is cached. The post status is derived from the attempts
* read here, so it cannot disagree with them even if a refresh was lost.
*/
export class StatusAggregator {
  constructor(
  private readonly items: ContentItemRepository,
  private readonly attempts: PublicationAttemptRepository
  ) {}

  async status(contentItemId: string): Promise<StatusSummary> {
  const item = await this.items.getById(contentItemId);
  if (!item) {
    throw NotFoundError.content();
  }

  const attempts = await this.attempts.listByContentItem(contentItemId);

  const byStatus: Record<AttemptStatus, number> = { pending: 0, processing: 0, published: 0, failed: 0 };
  for (const attempt of attempts) {
    byStatus[attempt.status]++;
  }

  return {
    postId: item.id,
    postStatus: deriveContentStatus(item.status, attempts.map(attempt => attempt.status)),
    totalPublications: attempts.length,
    byStatus,
    publications: attempts.map(attempt => ({
    id: attempt.id,
    network: attempt.network,
    status: attempt.status,
    publishedAt: attempt.publishedAt,
    errorMessage: attempt.errorMessage,
    retryCount: attempt.retryCount,
    metadata: attempt.metadata,
    })),
  };
  }
}
