import type { RequestInit, Response } from 'node-fetch';

// JSON values as they arrive from the API
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// Normalized image record
export interface ImageRecord {
  readonly contentUrl: string;
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly contentSize: number | null;      // Bytes
  readonly encodingFormat?: string;
  readonly hostPageUrl?: string;
  readonly thumbnailUrl?: string;
  readonly createdDate: Date | null;
  readonly contentType?: string;
  readonly accentColor?: string;
  readonly extras: Readonly<Record<string, JsonValue>>;  // Raw fields without a typed counterpart
}

// Normalized search result (one page, or several pages combined)
export interface SearchResultSet {
  readonly query: string;
  readonly images: readonly ImageRecord[];
  readonly nextOffset?: number;              // Present while more pages may exist
  readonly totalEstimatedMatches: number;
}

export const SAFE_SEARCH_LEVELS = ['Off', 'Moderate', 'Strict'] as const;
export type SafeSearch = typeof SAFE_SEARCH_LEVELS[number];

export const IMAGE_TYPES = [
  'AnimatedGif',
  'AnimatedGifHttps',
  'Clipart',
  'Line',
  'Photo',
  'Shopping',
  'Transparent',
] as const;
export type ImageType = typeof IMAGE_TYPES[number];

/**
 * Extra query parameters, applied in insertion order after the built-in ones
 */
export type ExtraParams = Readonly<Record<string, string | number | boolean>>;

// Search options
export interface SearchOptions {
  count?: number;           // Max 150 per page
  offset?: number;
  market?: string;          // e.g. "en-US"
  safeSearch?: SafeSearch;
  imageType?: ImageType;
  filter?: string;          // OData filter, sent as $filter
  extraParams?: ExtraParams;
}

export type SearchAllOptions = Omit<SearchOptions, 'count' | 'offset'>;

/**
 * API keys - stored separately from config
 */
export interface ApiKeys {
  bingSearchApiKey?: string;
}

/**
 * Settings accepted by the search client
 */
export interface SearchClientSettings {
  apiKey?: string;
  endpoint?: string;
  requestDelay?: number;    // Seconds between outbound requests
  maxRetries?: number;      // Attempts per request, including the first
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Time source used for rate limiting and backoff
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}
