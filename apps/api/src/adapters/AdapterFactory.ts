import { getOpenAiConfig, getOpenAiImageConfig, type NetworkCredentials } from '@config';
import type { ContentGenerator } from '@domain/publishing/application/ports/ContentGenerator';
import type { ImageGenerator } from '@domain/publishing/application/ports/ImageGenerator';
import type { NetworkPublisher } from '@domain/publishing/application/ports/NetworkPublisher';
import { PublisherRegistry } from '@domain/publishing/application/PublisherRegistry';
import { getLogger } from '@kernel/logger';

import { FacebookAdapter } from './facebook/FacebookAdapter';
import { OpenAIImageGenerator } from './images/OpenAIImageGenerator';
import { UnconfiguredImageGenerator } from './images/UnconfiguredImageGenerator';
import { InstagramAdapter } from './instagram/InstagramAdapter';
import { LinkedInAdapter } from './linkedin/LinkedInAdapter';
import { OpenAIContentGenerator } from './openai/OpenAIContentGenerator';
import { PassthroughContentGenerator } from './openai/PassthroughContentGenerator';
import { TikTokAdapter } from './tiktok/TikTokAdapter';
import { WhatsAppAdapter } from './whatsapp/WhatsAppAdapter';

const logger = getLogger('AdapterFactory');

/**
 * Build one publisher per network whose credentials are complete. Networks
 * left out have no publisher; their attempts fail with a permanent error.
 */
export function createPublishers(credentials: NetworkCredentials, timeoutMs: number): NetworkPublisher[] {
  const publishers: NetworkPublisher[] = [];
  const missing: string[] = [];

  const { facebook, instagram, linkedin, tiktok, whatsapp } = credentials;

  if (facebook.pageId && facebook.accessToken) {
    publishers.push(new FacebookAdapter(
      { pageId: facebook.pageId, accessToken: facebook.accessToken },
      timeoutMs
    ));
  } else {
    missing.push('facebook');
  }

  if (instagram.accountId && instagram.accessToken) {
    publishers.push(new InstagramAdapter(
      { accountId: instagram.accountId, accessToken: instagram.accessToken },
      timeoutMs
    ));
  } else {
    missing.push('instagram');
  }

  if (linkedin.authorUrn && linkedin.accessToken) {
    publishers.push(new LinkedInAdapter(
      { authorUrn: linkedin.authorUrn, accessToken: linkedin.accessToken },
      timeoutMs
    ));
  } else {
    missing.push('linkedin');
  }

  if (tiktok.accessToken) {
    publishers.push(new TikTokAdapter({ accessToken: tiktok.accessToken }, timeoutMs));
  } else {
    missing.push('tiktok');
  }

  if (whatsapp.phoneNumberId && whatsapp.recipient && whatsapp.accessToken) {
    publishers.push(new WhatsAppAdapter(
      {
        phoneNumberId: whatsapp.phoneNumberId,
        recipient: whatsapp.recipient,
        accessToken: whatsapp.accessToken,
      },
      timeoutMs
    ));
  } else {
    missing.push('whatsapp');
  }

  if (missing.length > 0) {
    logger.warn('Networks without credentials are disabled', { networks: missing });
  }

  return publishers;
}

export function createPublisherRegistry(credentials: NetworkCredentials, timeoutMs: number): PublisherRegistry {
  return new PublisherRegistry(createPublishers(credentials, timeoutMs));
}

export function createContentGenerator(config = getOpenAiConfig()): ContentGenerator {
  if (!config.apiKey) {
    logger.warn('OPENAI_API_KEY not set, adapting with the source text');
    return new PassthroughContentGenerator();
  }
  return new OpenAIContentGenerator({
    apiKey: config.apiKey,
    model: config.model,
    timeoutMs: config.timeoutMs,
  });
}

export function createImageGenerator(config = getOpenAiImageConfig()): ImageGenerator {
  if (!config.apiKey) {
    logger.warn('OPENAI_API_KEY not set, image generation is disabled');
    return new UnconfiguredImageGenerator();
  }
  return new OpenAIImageGenerator({
    apiKey: config.apiKey,
    model: config.model,
    timeoutMs: config.timeoutMs,
  });
}
