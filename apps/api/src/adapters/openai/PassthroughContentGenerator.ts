import type {
  ContentGenerator,
  GeneratedVariant,
  GenerationSource,
} from '@domain/publishing/application/ports/ContentGenerator';
import type { Network } from '@domain/publishing/domain/networks';

/**
 * Generator used when no model is configured: the source text unchanged.
 * The adapter applies the network's length limit afterwards.
 */
export class PassthroughContentGenerator implements ContentGenerator {
  async generate(source: GenerationSource, _network: Network): Promise<GeneratedVariant> {
    const adaptedText = `${source.title}\n\n${source.body}`;
    return {
      adaptedText,
      hashtags: [],
      imageSuggestion: '',
      characterCount: adaptedText.length,
      tone: 'original',
    };
  }
}
