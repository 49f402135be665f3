/**
 * JSONB helpers for metadata columns
 */

/** Maximum JSONB size in bytes (1MB) */
export const MAX_JSONB_SIZE = 1024 * 1024;

/**
 * Serialize data for a JSONB parameter
 * @throws Error if the serialized form exceeds maxSize bytes
 */
export function serializeForJSONB(data: unknown, maxSize: number = MAX_JSONB_SIZE): string {
  const jsonString = JSON.stringify(data);
  const sizeInBytes = Buffer.byteLength(jsonString, 'utf8');

  if (sizeInBytes > maxSize) {
    throw new Error(
      `JSONB data exceeds maximum size of ${maxSize} bytes ` +
      `(got ${sizeInBytes} bytes, ${jsonString.length} characters)`
    );
  }
  return jsonString;
}

/**
 * Read a JSONB column that must hold an object. pg already parses JSONB;
 * strings are accepted for drivers configured to return raw text.
 */
export function parseJSONBObject(value: unknown): Record<string, unknown> {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
