import type { JsonValue } from './types.js';
import { isJsonObject } from './utils.js';

export const UNKNOWN_API_ERROR = 'Unknown API error';

/**
 * Base class for errors derived from an API status code and body
 */
export class ImageSearchApiError extends Error {
  readonly statusCode: number;
  readonly response: JsonValue | null;

  constructor(message: string, statusCode: number, response: JsonValue | null = null) {
    super(message);
    this.name = 'ImageSearchApiError';
    this.statusCode = statusCode;
    this.response = response;
  }
}

// Invalid or missing subscription key
export class AuthenticationError extends ImageSearchApiError {
  constructor(message: string, statusCode: number, response: JsonValue | null = null) {
    super(message, statusCode, response);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends ImageSearchApiError {
  constructor(message: string, statusCode: number, response: JsonValue | null = null) {
    super(message, statusCode, response);
    this.name = 'RateLimitError';
  }
}

export class SearchError extends ImageSearchApiError {
  constructor(message: string, statusCode: number, response: JsonValue | null = null) {
    super(message, statusCode, response);
    this.name = 'SearchError';
  }
}

/**
 * Raised for a non-2xx response. Treated as a transport failure and retried;
 * callers can pass `status` and `body` to `classifyError`.
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: JsonValue;

  constructor(status: number, statusText: string, body: JsonValue) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ImageMappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageMappingError';
  }
}

function extractErrorMessage(raw: JsonValue | null): string {
  if (isJsonObject(raw)) {
    const error = raw.error;
    if (isJsonObject(error) && typeof error.message === 'string') {
      return error.message;
    }
  }
  return UNKNOWN_API_ERROR;
}

/**
 * Map an HTTP status code and optional error body to a typed error
 */
export function classifyError(statusCode: number, raw: JsonValue | null): ImageSearchApiError {
  const message = extractErrorMessage(raw);

  switch (statusCode) {
    case 401:
      return new AuthenticationError(`Authentication failed: ${message}`, statusCode, raw);
    case 429:
      return new RateLimitError(`Rate limit exceeded: ${message}`, statusCode, raw);
    default:
      return new SearchError(`Search error (${statusCode}): ${message}`, statusCode, raw);
  }
}
