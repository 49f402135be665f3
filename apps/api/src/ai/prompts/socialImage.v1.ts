import type { Network } from '@domain/publishing/domain/networks';

export const SOCIAL_IMAGE_PROMPT_V1 = {
  version: 'v1',
  build(text: string, network: Network): string {
    return [
      'Create a professional, eye-catching social media image that visually represents this post:',
      '',
      `"${text}"`,
      '',
      `Suitable for ${network}. No text or lettering in the image.`,
      'Vibrant colours, a clear composition and a clean modern style.',
    ].join('\n');
  },
};
