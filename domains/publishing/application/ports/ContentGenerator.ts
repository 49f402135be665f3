import type { Network } from '../../domain/networks';

export interface GenerationSource {
  title: string;
  body: string;
}

/**
* Network-specific variant produced by the generative model
*/
export interface GeneratedVariant {
  adaptedText: string;
  hashtags: string[];
  /** Free-text description of an image or video that would suit the post */
  imageSuggestion: string;
  characterCount: number;
  tone: string;
}

/**
* Generative adaptation capability. May fail per call.
*/
export interface ContentGenerator {
  generate(source: GenerationSource, network: Network): Promise<GeneratedVariant>;
}
