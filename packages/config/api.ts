/**
 * API Configuration
 *
 * HTTP server settings and external API endpoints.
 */

import { getSecretEnv, getEnvVar, parseIntEnv } from './env';

export const serverConfig = {
  port: parseIntEnv('PORT', 8000, { min: 1, max: 65535 }),
  host: getEnvVar('HOST') ?? '0.0.0.0',
  /** Maximum request body in bytes */
  bodyLimit: parseIntEnv('API_MAX_REQUEST_SIZE', 1024 * 1024, { min: 1024, max: 10 * 1024 * 1024 }),
} as const;

Object.freeze(serverConfig);

export const apiConfig = {
  /** API versions for external services */
  versions: {
    facebook: 'v19.0',
    instagram: 'v19.0',
    whatsapp: 'v19.0',
    linkedin: 'v2',
    tiktok: 'v2',
  },

  /** Base URLs for external APIs */
  baseUrls: {
    facebook: 'https://graph.facebook.com',
    instagram: 'https://graph.facebook.com',
    whatsapp: 'https://graph.facebook.com',
    linkedin: 'https://api.linkedin.com',
    tiktok: 'https://open.tiktokapis.com',
    openai: 'https://api.openai.com/v1',
  },
} as const;

/**
 * Network credentials. Each group is either complete or the network is disabled.
 */
export function getNetworkCredentials() {
  return {
    facebook: {
      pageId: getEnvVar('FACEBOOK_PAGE_ID'),
      accessToken: getSecretEnv('FACEBOOK_PAGE_ACCESS_TOKEN'),
    },
    instagram: {
      accountId: getEnvVar('INSTAGRAM_ACCOUNT_ID'),
      accessToken: getSecretEnv('INSTAGRAM_ACCESS_TOKEN'),
    },
    linkedin: {
      authorUrn: getEnvVar('LINKEDIN_AUTHOR_URN'),
      accessToken: getSecretEnv('LINKEDIN_ACCESS_TOKEN'),
    },
    tiktok: {
      accessToken: getSecretEnv('TIKTOK_ACCESS_TOKEN'),
    },
    whatsapp: {
      phoneNumberId: getEnvVar('WHATSAPP_PHONE_NUMBER_ID'),
      recipient: getEnvVar('WHATSAPP_RECIPIENT'),
      accessToken: getSecretEnv('WHATSAPP_ACCESS_TOKEN'),
    },
  };
}

export type NetworkCredentials = ReturnType<typeof getNetworkCredentials>;

export function getOpenAiConfig() {
  return {
    apiKey: getSecretEnv('OPENAI_API_KEY'),
    model: getEnvVar('OPENAI_MODEL') ?? 'gpt-4o-mini',
    timeoutMs: parseIntEnv('OPENAI_TIMEOUT_MS', 30_000, { min: 1_000, max: 120_000 }),
  };
}

/**
 * Image generation shares the OpenAI key; model and timeout are separate
 * because image calls are slower than chat completions.
 */
export function getOpenAiImageConfig() {
  return {
    apiKey: getSecretEnv('OPENAI_API_KEY'),
    model: getEnvVar('OPENAI_IMAGE_MODEL') ?? 'dall-e-3',
    timeoutMs: parseIntEnv('OPENAI_IMAGE_TIMEOUT_MS', 60_000, { min: 1_000, max: 180_000 }),
  };
}
