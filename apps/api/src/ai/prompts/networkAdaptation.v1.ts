import type { Network } from '@domain/publishing/domain/networks';
import { NETWORK_CHARACTER_LIMITS } from '@domain/publishing/domain/networks';

const NETWORK_STYLE: Readonly<Record<Network, string>> = {
  facebook: 'Conversational and community-oriented. Short paragraphs, a clear call to action, at most 3 hashtags.',
  instagram: 'Visual and emotive. Open with a hook, use line breaks and emojis sparingly, 5 to 10 hashtags at the end.',
  linkedin: 'Professional and insight-driven. Lead with the takeaway, no emojis, at most 3 hashtags.',
  tiktok: 'Energetic and informal. One punchy sentence suitable as a video caption, 3 to 5 trending-style hashtags.',
  whatsapp: 'Direct and personal, like a message to a friend. No hashtags.',
};

export const NETWORK_ADAPTATION_PROMPT_V1 = {
  version: 'v1',
  system: `You adapt a piece of content for one social network.
Keep the facts of the source. Do not invent offers, dates or figures.
Return ONLY valid JSON with the keys:
"text" (the post), "hashtags" (array of strings starting with #),
"image_suggestion" (one sentence describing a fitting image or video),
"tone" (one or two words).`,
  task(network: Network, title: string, body: string): string {
    return [
      `Network: ${network}`,
      `Style: ${NETWORK_STYLE[network]}`,
      `Maximum length: ${NETWORK_CHARACTER_LIMITS[network]} characters`,
      '',
      `Title: ${title}`,
      '',
      body,
    ].join('\n');
  },
};
