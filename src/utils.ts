import { setTimeout as delay } from 'timers/promises';
import type { Clock, JsonObject, JsonValue } from './types.js';

/**
 * Utility functions for security, JSON handling and timing
 */

/**
 * Sanitize error message to remove potentially sensitive information
 * Removes subscription keys, tokens and other sensitive data
 */
export function sanitizeError(errorText: string, maxLength: number = 200): string {
  if (!errorText) return '';

  let sanitized = errorText;

  // Remove subscription key headers
  sanitized = sanitized.replace(/ocp-apim-subscription-key[:\s=]+[^\s,}]+/gi, 'Ocp-Apim-Subscription-Key: [REMOVED]');

  // Remove keys passed as query parameters
  sanitized = sanitized.replace(/([?&](?:key|subscription-key)=)[^&\s]+/gi, '$1[REMOVED]');

  // Remove bearer tokens
  sanitized = sanitized.replace(/Bearer\s+[a-zA-Z0-9_-]+/gi, 'Bearer [TOKEN_REMOVED]');

  // Bing keys are 32 hex characters
  sanitized = sanitized.replace(/\b[a-f0-9]{32}\b/gi, '[API_KEY_REMOVED]');
  sanitized = sanitized.replace(/[a-zA-Z0-9]{41,}/g, '[API_KEY_REMOVED]');

  // Limit length
  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + '...';
  }

  return sanitized;
}

/**
 * Sanitize error object for logging/returning
 */
export function sanitizeErrorForResponse(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeError(error.message);
  }
  return sanitizeError(String(error));
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body as JSON, falling back to the raw text
 */
export function parseBody(text: string): JsonValue {
  if (!text) return null;
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(ms);
  },
};
