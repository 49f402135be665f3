import { randomUUID } from 'crypto';
import { z } from 'zod';

import { NotFoundError, ValidationError } from '@errors';
import { getLogger } from '@kernel/logger';

import { CONTENT_STATUSES, ContentItem } from '../domain/entities/ContentItem';
import type { PublicationAttempt } from '../domain/entities/PublicationAttempt';
import type { ContentItemRepository } from './ports/ContentItemRepository';
import type { PublicationAttemptRepository } from './ports/PublicationAttemptRepository';

const logger = getLogger('publishing:content');

// ============================================================================
// Input Schemas
// ============================================================================

export const CreateContentItemSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(ContentItem.VALIDATION.MAX_TITLE_LENGTH),
  body: z.string().trim().min(1, 'Content is required').max(ContentItem.VALIDATION.MAX_BODY_LENGTH),
});

export type CreateContentItemInput = z.input<typeof CreateContentItemSchema>;

export const ListContentItemsSchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  status: z.enum(CONTENT_STATUSES).optional(),
});

export type ListContentItemsInput = z.input<typeof ListContentItemsSchema>;

export interface ContentItemWithAttempts {
  item: ContentItem;
  attempts: PublicationAttempt[];
}

// ============================================================================
// Content Service
// ============================================================================

/**
* CRUD over content items. Status changes never happen here; they come from
* the attempt lifecycle through ContentStatusProjector.
*/
export class ContentService {
  constructor(
  private readonly items: ContentItemRepository,
  private readonly attempts: PublicationAttemptRepository
  ) {}

  async create(input: CreateContentItemInput): Promise<ContentItem> {
  const parsed = CreateContentItemSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZodIssues(parsed.error.issues);
  }

  const item = ContentItem.create(randomUUID(), parsed.data.title, parsed.data.body);
  await this.items.save(item);

  logger.info('Content item created', { contentItemId: item.id });
  return item;
  }

  async list(input: ListContentItemsInput = {}): Promise<ContentItem[]> {
  const parsed = ListContentItemsSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZodIssues(parsed.error.issues);
  }
  return this.items.list(parsed.data);
  }

  /**
  * @throws NotFoundError when the item does not exist
  */
  async get(id: string): Promise<ContentItemWithAttempts> {
  const item = await this.items.getById(id);
  if (!item) {
    throw NotFoundError.content();
  }
  const attempts = await this.attempts.listByContentItem(id);
  // Status as the attempts read here imply
  return { item: item.reconcile(attempts.map(attempt => attempt.status)), attempts };
  }

  /**
  * Delete the item and its attempts
  */
  async delete(id: string): Promise<void> {
  const deleted = await this.items.delete(id);
  if (!deleted) {
    throw NotFoundError.content();
  }
  logger.info('Content item deleted', { contentItemId: id });
  }
}
