import fetch from 'node-fetch';

import { PublishFailure } from '@domain/publishing/application/ports/NetworkPublisher';
import { getErrorMessage } from '@errors';
import { redactToken } from '@kernel/redaction';

// ============================================================================
// Type Definitions
// ============================================================================

export type JsonObject = Record<string, unknown>;

export interface PlatformRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Form bodies for the Graph API, JSON strings elsewhere */
  body?: URLSearchParams | string;
  timeoutMs: number;
}

const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.m4v', '.webm'];

// ============================================================================
// Type Guards
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function readString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

/**
 * Media type is taken from the URL path; query strings are ignored
 */
export function isVideoUrl(url: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    pathname = url.toLowerCase();
  }
  return VIDEO_EXTENSIONS.some(ext => pathname.endsWith(ext));
}

/**
 * Error detail from the shapes the supported APIs return:
 * `{ error: { message } }` (Graph, TikTok) or `{ message }` (LinkedIn)
 */
function extractErrorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isJsonObject(parsed)) {
      const nested = parsed['error'];
      if (isJsonObject(nested)) {
        const message = readString(nested, 'message');
        if (message) {
          return message;
        }
      }
      const message = readString(parsed, 'message');
      if (message) {
        return message;
      }
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  return body.slice(0, 200);
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

// ============================================================================
// Request
// ============================================================================

/**
 * Call a platform API and return its JSON object body.
 *
 * Timeouts, connection errors, 429 and 5xx become transient failures; any
 * other non-2xx or an unreadable body is permanent.
 *
 * @param platform - Display name used in error messages
 */
export async function requestJson(platform: string, url: string, init: PlatformRequest): Promise<JsonObject> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), init.timeoutMs);

  let status: number;
  let ok: boolean;
  let text: string;
  try {
    const res = await fetch(url, {
      method: init.method ?? 'POST',
      headers: init.headers,
      body: init.body,
      signal: controller.signal,
    });
    status = res.status;
    ok = res.ok;
    text = await res.text();
  } catch (error) {
    if (controller.signal.aborted) {
      throw PublishFailure.transient(`${platform} request timed out after ${init.timeoutMs}ms`);
    }
    const cause = error instanceof Error ? error : undefined;
    throw PublishFailure.transient(
      `${platform} request failed: ${redactToken(getErrorMessage(error))}`,
      undefined,
      cause
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!ok) {
    const message = `${platform} API error ${status}: ${redactToken(extractErrorDetail(text))}`;
    throw isRetryableStatus(status)
      ? PublishFailure.transient(message, status)
      : PublishFailure.permanent(message, status);
  }

  let parsed: unknown;
  try {
    parsed = text.length > 0 ? JSON.parse(text) : {};
  } catch {
    throw PublishFailure.permanent(`Invalid response from ${platform}: body is not JSON`, status);
  }
  if (!isJsonObject(parsed)) {
    throw PublishFailure.permanent(`Invalid response from ${platform}: expected an object`, status);
  }
  return parsed;
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}
