import { NotFoundError, ValidationError } from '@errors';
import { getLogger } from '@kernel/logger';

import { isNetwork, type Network } from '../domain/networks';
import { InvalidNetworkError } from '../domain/errors';
import type { ContentItemRepository } from './ports/ContentItemRepository';
import type { ImageGenerator } from './ports/ImageGenerator';
import type { PublicationAttemptRepository } from './ports/PublicationAttemptRepository';

const logger = getLogger('publishing:images');

/** Longest slice of post text that goes into an image prompt */
export const MAX_IMAGE_SOURCE_LENGTH = 500;

export interface GenerateImageRequest {
  network: string;
  /** Text shown in an adaptation preview; defaults to the stored publication text */
  adaptedText?: string | undefined;
}

export interface ImageOutcome {
  contentItemId: string;
  network: Network;
  imageUrl: string;
  revisedPrompt: string | null;
}

/**
* Generates an illustration for one network's version of a content item.
* The URL is returned to the caller, who passes it to publish.
*/
export class ImageService {
  constructor(
  private readonly items: ContentItemRepository,
  private readonly attempts: PublicationAttemptRepository,
  private readonly generator: ImageGenerator
  ) {}

  /**
  * @throws InvalidNetworkError for a network outside the supported set
  * @throws NotFoundError when the content item does not exist
  * @throws ValidationError when there is no text to illustrate
  */
  async generate(contentItemId: string, request: GenerateImageRequest): Promise<ImageOutcome> {
  const { network } = request;
  if (!isNetwork(network)) {
    throw new InvalidNetworkError([network]);
  }

  const item = await this.items.getById(contentItemId);
  if (!item) {
    throw NotFoundError.content();
  }

  const text = request.adaptedText !== undefined
    ? request.adaptedText.trim()
    : await this.storedText(item.id, network);
  if (!text) {
    throw new ValidationError(`Adapted text for ${network} is empty`);
  }

  const image = await this.generator.generate({
    text: text.slice(0, MAX_IMAGE_SOURCE_LENGTH),
    network,
  });

  logger.info('Image generated', { contentItemId, network });
  return { contentItemId, network, imageUrl: image.url, revisedPrompt: image.revisedPrompt };
  }

  /** Text of the most recent attempt for the network */
  private async storedText(contentItemId: string, network: Network): Promise<string> {
  const attempts = await this.attempts.listByContentItem(contentItemId);
  const latest = attempts.filter(attempt => attempt.network === network).at(-1);
  if (!latest) {
    throw new ValidationError(`No adapted text for ${network}; adapt the content item first`);
  }
  return latest.adaptedContent.trim();
  }
}
