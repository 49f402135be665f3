import type {
  GeneratedImage,
  ImageGenerator,
  ImageRequest,
} from '@domain/publishing/application/ports/ImageGenerator';
import { ServiceUnavailableError } from '@errors';

/**
 * Stand-in when no image model is configured. Unlike text adaptation there
 * is no useful fallback, so every call is refused.
 */
export class UnconfiguredImageGenerator implements ImageGenerator {
  async generate(_request: ImageRequest): Promise<GeneratedImage> {
    throw new ServiceUnavailableError('Image generation is not configured: OPENAI_API_KEY is not set');
  }
}
