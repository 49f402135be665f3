import fetch from 'node-fetch';
import { z } from 'zod';

import { apiConfig } from '@config';
import type {
  ContentGenerator,
  GeneratedVariant,
  GenerationSource,
} from '@domain/publishing/application/ports/ContentGenerator';
import type { Network } from '@domain/publishing/domain/networks';
import { ServiceUnavailableError } from '@errors';
import { getLogger } from '@kernel/logger';

import { NETWORK_ADAPTATION_PROMPT_V1 } from '../../ai/prompts/networkAdaptation.v1';

const logger = getLogger('OpenAIContentGenerator');

/** Truncate provider error bodies before they reach logs */
const MAX_ERROR_BODY_LENGTH = 500;

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

const AdaptationSchema = z.object({
  text: z.string().min(1),
  hashtags: z.array(z.string()).default([]),
  image_suggestion: z.string().default(''),
  tone: z.string().default(''),
});

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}

/**
 * ContentGenerator backed by OpenAI chat completions in JSON mode.
 * One request per (source, network); no retries here, a failed call fails
 * only that network's variant.
 */
export class OpenAIContentGenerator implements ContentGenerator {
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAIGeneratorOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.baseUrl = options.baseUrl ?? apiConfig.baseUrls.openai;
  }

  async generate(source: GenerationSource, network: Network): Promise<GeneratedVariant> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let raw: unknown;
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          temperature: 0.7,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: NETWORK_ADAPTATION_PROMPT_V1.system },
            { role: 'user', content: NETWORK_ADAPTATION_PROMPT_V1.task(network, source.title, source.body) },
          ],
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = (await response.text()).slice(0, MAX_ERROR_BODY_LENGTH);
        logger.warn('OpenAI request failed', { network, status: response.status, body });
        throw new ServiceUnavailableError(`OpenAI API error: ${response.status}`);
      }

      raw = await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ServiceUnavailableError(`OpenAI request timed out after ${this.options.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const completion = ChatCompletionSchema.safeParse(raw);
    if (!completion.success) {
      throw new Error('Invalid response format from OpenAI API');
    }

    const content = completion.data.choices[0]?.message.content;
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new Error('OpenAI completion is not valid JSON');
    }

    const adaptation = AdaptationSchema.safeParse(parsed);
    if (!adaptation.success) {
      throw new Error(`OpenAI completion has an unexpected shape: ${adaptation.error.issues[0]?.message ?? 'unknown'}`);
    }

    const { text, hashtags, image_suggestion, tone } = adaptation.data;
    return {
      adaptedText: text,
      hashtags,
      imageSuggestion: image_suggestion,
      characterCount: text.length,
      tone,
    };
  }
}
