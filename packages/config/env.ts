/**
 * Environment Variable Utilities
 *
 * Safe parsing of environment variables into typed config values.
 */

import { getLogger } from '@kernel/logger';

const logger = getLogger('config');

const PLACEHOLDER_PATTERN = /\bplaceholder\b|\byour_|\bxxx\b|\bchangeme\b|^\s*$/i;

export interface IntBounds {
  min?: number;
  max?: number;
}

/**
 * Get environment variable value; empty strings count as unset
 */
export function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Check if a value is a placeholder left over from an .env template
 */
export function isPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  return PLACEHOLDER_PATTERN.test(value.trim());
}

/**
 * Get a credential from the environment, treating template placeholders as unset
 */
export function getSecretEnv(name: string): string | undefined {
  const value = getEnvVar(name);
  if (value && isPlaceholder(value)) {
    logger.warn('Ignoring placeholder value for secret', { name });
    return undefined;
  }
  return value;
}

/**
 * Parse integer environment variable with default and optional bounds.
 * Out-of-range values fall back to the default.
 */
export function parseIntEnv(name: string, defaultValue: number, bounds: IntBounds = {}): number {
  const trimmed = process.env[name]?.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed)) {
    logger.warn('Non-integer value, using default', { name, value: trimmed, defaultValue });
    return defaultValue;
  }
  if ((bounds.min !== undefined && parsed < bounds.min) || (bounds.max !== undefined && parsed > bounds.max)) {
    logger.warn('Value out of range, using default', { name, value: parsed, ...bounds, defaultValue });
    return defaultValue;
  }
  return parsed;
}

/**
 * Read a required environment variable
 * @throws Error when unset or empty
 */
export function requireEnv(name: string): string {
  const value = getEnvVar(name);
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}
