/**
 * Environment Validation Schema
 *
 * Fail-fast boot validation of the variables both processes need.
 * Network credentials are optional: a network without credentials simply has
 * no publisher registered.
 *
 * @module @config/schema
 */

import { z } from 'zod';

const postgresUrl = z.string().regex(/^postgres(ql)?:\/\//, {
  message: 'must be a postgres:// or postgresql:// connection string',
});

const redisUrl = z.string().regex(/^rediss?:\/\//, {
  message: 'must be a redis:// or rediss:// URL',
});

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),

  DATABASE_URL: postgresUrl,
  REDIS_URL: redisUrl,

  PUBLISH_MAX_RETRIES: z.coerce.number().int().min(0).max(20).optional(),
  PUBLISH_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(600_000).optional(),

  OPENAI_API_KEY: z.string().min(10).optional(),
  OPENAI_MODEL: z.string().min(1).optional(),
  OPENAI_IMAGE_MODEL: z.string().min(1).optional(),

  FACEBOOK_PAGE_ID: z.string().regex(/^\d+$/, { message: 'must be a numeric page id' }).optional(),
  FACEBOOK_PAGE_ACCESS_TOKEN: z.string().min(10).optional(),
  INSTAGRAM_ACCOUNT_ID: z.string().regex(/^\d+$/, { message: 'must be a numeric account id' }).optional(),
  INSTAGRAM_ACCESS_TOKEN: z.string().min(10).optional(),
  LINKEDIN_ACCESS_TOKEN: z.string().min(10).optional(),
  LINKEDIN_AUTHOR_URN: z.string().regex(/^urn:li:(person|organization):/, {
    message: 'must be a urn:li:person or urn:li:organization URN',
  }).optional(),
  TIKTOK_ACCESS_TOKEN: z.string().min(10).optional(),
  WHATSAPP_PHONE_NUMBER_ID: z.string().regex(/^\d+$/).optional(),
  WHATSAPP_ACCESS_TOKEN: z.string().min(10).optional(),
  WHATSAPP_RECIPIENT: z.string().regex(/^\+?\d{6,15}$/, { message: 'must be an E.164 phone number' }).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate the environment at startup
 * @throws Error listing every invalid variable
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): Env {
  // Empty strings from .env templates count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}
