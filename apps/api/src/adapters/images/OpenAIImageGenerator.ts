import fetch from 'node-fetch';
import { z } from 'zod';

import { apiConfig } from '@config';
import type {
  GeneratedImage,
  ImageGenerator,
  ImageRequest,
} from '@domain/publishing/application/ports/ImageGenerator';
import { ServiceUnavailableError } from '@errors';
import { getLogger } from '@kernel/logger';

import { SOCIAL_IMAGE_PROMPT_V1 } from '../../ai/prompts/socialImage.v1';

const logger = getLogger('OpenAIImageGenerator');

const MAX_ERROR_BODY_LENGTH = 200;

/**
 * Hosts OpenAI serves generated images from. Any other URL in a response is
 * rejected before it can reach a publisher.
 */
const TRUSTED_IMAGE_HOST_SUFFIXES: readonly string[] = [
  '.openai.com',
  '.oaiusercontent.com',
  '.blob.core.windows.net',
];

const ImageResponseSchema = z.object({
  created: z.number(),
  data: z.array(z.object({
    url: z.string(),
    revised_prompt: z.string().optional(),
  })).min(1),
});

export interface OpenAIImageOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}

function assertTrustedImageUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`OpenAI returned an unparseable image URL: "${url.slice(0, 100)}"`);
  }
  if (parsed.protocol !== 'https:') {
    throw new Error(`OpenAI image URL must use HTTPS, got "${parsed.protocol}"`);
  }
  const hostname = parsed.hostname.toLowerCase();
  const trusted = TRUSTED_IMAGE_HOST_SUFFIXES.some(
    suffix => hostname === suffix.slice(1) || hostname.endsWith(suffix)
  );
  if (!trusted) {
    throw new Error(`OpenAI image URL hostname "${hostname}" is not trusted`);
  }
}

/**
 * ImageGenerator backed by the OpenAI images API. One 1024x1024 image per
 * call, returned as a hosted URL.
 */
export class OpenAIImageGenerator implements ImageGenerator {
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAIImageOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.baseUrl = options.baseUrl ?? apiConfig.baseUrls.openai;
  }

  async generate(request: ImageRequest): Promise<GeneratedImage> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let raw: unknown;
    try {
      const response = await fetch(`${this.baseUrl}/images/generations`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          prompt: SOCIAL_IMAGE_PROMPT_V1.build(request.text, request.network),
          size: '1024x1024',
          n: 1,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = (await response.text()).slice(0, MAX_ERROR_BODY_LENGTH);
        logger.warn('OpenAI image request failed', { network: request.network, status: response.status, body });
        throw new ServiceUnavailableError(`OpenAI image API error: ${response.status}`);
      }

      raw = await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ServiceUnavailableError(`OpenAI image request timed out after ${this.options.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = ImageResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Invalid response format from OpenAI image API');
    }

    const [image] = parsed.data.data;
    if (!image) {
      throw new Error('OpenAI returned no image');
    }
    assertTrustedImageUrl(image.url);

    return { url: image.url, revisedPrompt: image.revised_prompt ?? null };
  }
}
