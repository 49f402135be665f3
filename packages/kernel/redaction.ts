/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to log metadata. Network
 * credentials (page tokens, bearer tokens, API keys) must never reach log output.
 */

const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^access[_-]?token$/i,
  /^refresh[_-]?token$/i,
  /^client[_-]?secret$/i,
  /^authorization$/i,
  /^cookie$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
];

const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^sk-[a-zA-Z0-9_-]{20,}$/,      // OpenAI key
  /^EAA[a-zA-Z0-9]{20,}$/,        // Graph API token
  /^[a-zA-Z0-9_-]+\.eyJ/,         // JWT
  /^Bearer\s+\S+/,
];

const MAX_DEPTH = 8;

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like a credential
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Replace access_token query parameters in URLs and messages
 */
export function redactToken(text: string): string {
  return text.replace(/access_token=[^&\s]+/gi, 'access_token=[REDACTED]');
}

function sanitizeValue(value: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (typeof value === 'string') {
    return isSensitiveValue(value) ? '[REDACTED]' : redactToken(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => sanitizeValue(item, depth + 1));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactToken(value.message) };
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = isSensitiveField(key) ? '[REDACTED]' : sanitizeValue(nested, depth + 1);
    }
    return result;
  }
  return value;
}

/**
 * Recursively sanitize log metadata.
 */
export function sanitizeForLogging(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = isSensitiveField(key) ? '[REDACTED]' : sanitizeValue(value, 1);
  }
  return result;
}
