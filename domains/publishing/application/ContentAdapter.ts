import { randomUUID } from 'crypto';
import { z } from 'zod';

import { ConflictError, NotFoundError, ValidationError, getErrorMessage } from '@errors';
import { getLogger } from '@kernel/logger';

import type { ContentItem } from '../domain/entities/ContentItem';
import { PublicationAttempt } from '../domain/entities/PublicationAttempt';
import { InvalidNetworkError } from '../domain/errors';
import { isNetwork, truncateForNetwork, type Network } from '../domain/networks';
import type { ContentStatusProjector } from './ContentStatusProjector';
import type { ContentGenerator } from './ports/ContentGenerator';
import type { ContentItemRepository } from './ports/ContentItemRepository';
import {
  ActiveAttemptExistsError,
  type PublicationAttemptRepository,
} from './ports/PublicationAttemptRepository';

const logger = getLogger('publishing:adapter');

// ============================================================================
// Type Definitions
// ============================================================================

export const AdaptRequestSchema = z.object({
  networks: z.array(z.string().trim().toLowerCase()).min(1, 'At least one network is required'),
  previewOnly: z.boolean().default(false),
});

export type AdaptRequest = z.input<typeof AdaptRequestSchema>;

export interface AdaptedVariant {
  network: Network;
  ok: true;
  adaptedText: string;
  hashtags: string[];
  imageSuggestion: string;
  characterCount: number;
  tone: string;
}

/**
* Generation failed for this network; the source text is returned as-is
*/
export interface FailedVariant {
  network: Network;
  ok: false;
  error: string;
  adaptedText: string;
}

export type AdaptationResult = AdaptedVariant | FailedVariant;

export interface AdaptOutcome {
  contentItemId: string;
  previewOnly: boolean;
  results: AdaptationResult[];
  /** Attempts persisted by this call; always empty in preview mode */
  attempts: PublicationAttempt[];
}

// ============================================================================
// Content Adapter
// ============================================================================

/**
* Turns one content item into per-network variants.
*
* Preview mode only returns the variants. Commit mode also persists one
* pending attempt per network whose generation succeeded.
*/
export class ContentAdapter {
  constructor(
  private readonly items: ContentItemRepository,
  private readonly attempts: PublicationAttemptRepository,
  private readonly generator: ContentGenerator,
  private readonly projector: ContentStatusProjector
  ) {}

  /**
  * @throws InvalidNetworkError for networks outside the supported set
  * @throws NotFoundError when the content item does not exist
  * @throws ConflictError when a network still has a pending or processing attempt
  */
  async adapt(contentItemId: string, request: AdaptRequest): Promise<AdaptOutcome> {
  const { networks, previewOnly } = this.validate(request);

  const item = await this.items.getById(contentItemId);
  if (!item) {
    throw NotFoundError.content();
  }

  if (!previewOnly) {
    await this.assertNoActiveAttempts(item.id, networks);
  }

  const results = await this.generateAll(item, networks);

  if (previewOnly) {
    logger.info('Adaptation previewed', { contentItemId, networks });
    return { contentItemId, previewOnly, results, attempts: [] };
  }

  const attempts = results
    .filter((result): result is AdaptedVariant => result.ok)
    .map(result => PublicationAttempt.create(randomUUID(), item.id, result.network, result.adaptedText));

  if (attempts.length > 0) {
    try {
    await this.attempts.createMany(attempts);
    } catch (error) {
    if (error instanceof ActiveAttemptExistsError) {
      throw new ConflictError('A publication for one of these networks is already in progress', {
      networks: attempts.map(a => a.network),
      });
    }
    throw error;
    }
    await this.projector.refreshAfterWrite(item.id);
  }

  logger.info('Adaptation committed', {
    contentItemId,
    created: attempts.length,
    failed: results.length - attempts.length,
  });

  return { contentItemId, previewOnly, results, attempts };
  }

  private validate(request: AdaptRequest): { networks: Network[]; previewOnly: boolean } {
  const parsed = AdaptRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw ValidationError.fromZodIssues(parsed.error.issues);
  }

  const invalid = parsed.data.networks.filter(name => !isNetwork(name));
  if (invalid.length > 0) {
    throw new InvalidNetworkError(invalid);
  }

  const networks = parsed.data.networks.filter(isNetwork);
  if (new Set(networks).size !== networks.length) {
    throw new ValidationError('Networks must be distinct', { networks });
  }

  return { networks, previewOnly: parsed.data.previewOnly };
  }

  private async assertNoActiveAttempts(contentItemId: string, networks: readonly Network[]): Promise<void> {
  const existing = await this.attempts.listByContentItem(contentItemId);
  const busy = networks.filter(network =>
    existing.some(attempt => attempt.network === network && attempt.isActive())
  );
  if (busy.length > 0) {
    throw new ConflictError(`Publications already in progress for: ${busy.join(', ')}`, { networks: busy });
  }
  }

  /**
  * One generator call per network, concurrently. A failed call only affects
  * its own network.
  */
  private async generateAll(item: ContentItem, networks: readonly Network[]): Promise<AdaptationResult[]> {
  const source = { title: item.title, body: item.body };
  const settled = await Promise.allSettled(
    networks.map(network => this.generator.generate(source, network))
  );

  return settled.map((outcome, index): AdaptationResult => {
    const network = networks[index];
    if (network === undefined) {
    throw new Error(`No network at index ${index}`);
    }

    if (outcome.status === 'rejected') {
    const error = getErrorMessage(outcome.reason);
    logger.warn('Generation failed for network', { contentItemId: item.id, network, error });
    return { network, ok: false, error, adaptedText: `${item.title}\n\n${item.body}` };
    }

    const adaptedText = truncateForNetwork(outcome.value.adaptedText, network);
    return {
    network,
    ok: true,
    adaptedText,
    hashtags: outcome.value.hashtags,
    imageSuggestion: outcome.value.imageSuggestion,
    characterCount: adaptedText.length,
    tone: outcome.value.tone,
    };
  });
  }
}
