import type { Network } from '../../domain/networks';

export interface ImageRequest {
  /** Post text the image should illustrate */
  text: string;
  network: Network;
}

export interface GeneratedImage {
  /** Provider-hosted URL; usable as a publish image_url until it expires */
  url: string;
  revisedPrompt: string | null;
}

/**
* Text-to-image capability. Nothing is downloaded or stored.
*/
export interface ImageGenerator {
  generate(request: ImageRequest): Promise<GeneratedImage>;
}
