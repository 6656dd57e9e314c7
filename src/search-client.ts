import fetch from 'node-fetch';
import type {
  Clock,
  FetchFn,
  ImageRecord,
  JsonObject,
  SearchAllOptions,
  SearchClientSettings,
  SearchOptions,
  SearchResultSet,
} from './types.js';
import { DEFAULT_ENDPOINT, DEFAULT_MAX_RETRIES, DEFAULT_REQUEST_DELAY } from './config.js';
import { ConfigurationError, HttpStatusError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { mapResult } from './mappers.js';
import { RateLimiter } from './rate-limiter.js';
import { isJsonObject, parseBody, sanitizeErrorForResponse, systemClock } from './utils.js';

// Maximum page size accepted by the API
export const MAX_COUNT_PER_REQUEST = 150;
export const REQUEST_TIMEOUT_MS = 30_000;

export interface SearchClientDependencies {
  fetch?: FetchFn;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Bing Image Search client - rate limited, retrying, one request in flight at a time
 */
export class ImageSearchClient {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly maxRetries: number;
  private readonly fetch: FetchFn;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter;

  constructor(settings: SearchClientSettings, dependencies: SearchClientDependencies = {}) {
    this.logger = dependencies.logger ?? defaultLogger;
    this.fetch = dependencies.fetch ?? ((url, init) => fetch(url, init));
    this.clock = dependencies.clock ?? systemClock;

    if (!settings.apiKey) {
      this.logger.error('No API key provided. Set BING_SEARCH_API_KEY in the environment or .env file.');
      throw new ConfigurationError('No API key provided');
    }

    const endpoint = settings.endpoint ?? DEFAULT_ENDPOINT;
    if (!endpoint) {
      this.logger.error('No API endpoint provided.');
      throw new ConfigurationError('No API endpoint provided');
    }

    const maxRetries = settings.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new ConfigurationError(`maxRetries must be a positive integer (got ${maxRetries})`);
    }

    this.apiKey = settings.apiKey;
    this.endpoint = endpoint;
    this.maxRetries = maxRetries;

    const requestDelay = settings.requestDelay ?? DEFAULT_REQUEST_DELAY;
    this.rateLimiter = new RateLimiter(requestDelay * 1000, this.clock, this.logger);
  }

  /**
   * Search for one page of images
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResultSet> {
    await this.rateLimiter.waitForSlot();

    const url = this.buildUrl(query, options);
    const headers = {
      'Ocp-Apim-Subscription-Key': this.apiKey,
      'Accept': 'application/json',
    };

    const data = await this.requestWithRetries(url, headers);
    const result = mapResult(query, data, this.logger);
    this.logger.info(`Found ${result.images.length} images for query: '${query}'`);

    return result;
  }

  /**
   * Search page by page until `maxImages` images are collected or the results run out.
   * `totalEstimatedMatches` comes from the last page fetched.
   */
  async searchAll(query: string, maxImages: number = 100, options: SearchAllOptions = {}): Promise<SearchResultSet> {
    const images: ImageRecord[] = [];
    const countPerRequest = Math.min(MAX_COUNT_PER_REQUEST, maxImages);
    let offset = 0;
    let totalEstimatedMatches = 0;

    while (images.length < maxImages) {
      const remaining = maxImages - images.length;
      const count = Math.min(remaining, countPerRequest);

      this.logger.info(`Searching for ${count} images with offset ${offset}...`);
      const page = await this.search(query, { ...options, count, offset });

      images.push(...page.images);
      totalEstimatedMatches = page.totalEstimatedMatches;

      if (!page.nextOffset || page.images.length === 0) {
        this.logger.info(`No more results available after ${images.length} images`);
        break;
      }

      offset = page.nextOffset;
      this.logger.info(`Retrieved ${images.length}/${maxImages} images...`);
    }

    if (images.length > maxImages) {
      this.logger.info(`Dropping ${images.length - maxImages} images beyond the requested ${maxImages}`);
    }

    const combined: SearchResultSet = {
      query,
      images: images.slice(0, Math.max(maxImages, 0)),
      totalEstimatedMatches,
    };

    this.logger.info(`Retrieved a total of ${combined.images.length} images for query: '${query}'`);
    return combined;
  }

  private buildUrl(query: string, options: SearchOptions): string {
    const url = new URL(this.endpoint);
    const params = url.searchParams;

    params.set('q', query);
    params.set('count', String(Math.min(options.count ?? 50, MAX_COUNT_PER_REQUEST)));
    params.set('offset', String(options.offset ?? 0));
    params.set('mkt', options.market ?? 'en-US');
    params.set('safeSearch', options.safeSearch ?? 'Moderate');

    if (options.imageType) {
      params.set('imageType', options.imageType);
    }
    if (options.filter) {
      params.set('$filter', options.filter);
    }

    // Extras win over built-in parameters of the same name
    for (const [key, value] of Object.entries(options.extraParams ?? {})) {
      params.set(key, String(value));
    }

    return url.toString();
  }

  private async requestWithRetries(url: string, headers: Record<string, string>): Promise<JsonObject> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        this.logger.debug(`Making request (attempt ${attempt}/${this.maxRetries})`);
        return await this.request(url, headers);
      } catch (error) {
        lastError = error;
        this.logger.warn(`Request failed (attempt ${attempt}/${this.maxRetries}): ${sanitizeErrorForResponse(error)}`);

        if (attempt < this.maxRetries) {
          // 1s, 2s, 4s, ...
          const waitSeconds = 2 ** (attempt - 1);
          this.logger.info(`Retrying in ${waitSeconds} seconds...`);
          await this.clock.sleep(waitSeconds * 1000);
        }
      }
    }

    this.logger.error(`All ${this.maxRetries} request attempts failed`, lastError);
    throw lastError;
  }

  private async request(url: string, headers: Record<string, string>): Promise<JsonObject> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await this.fetch(url, { headers, signal: controller.signal });

      if (!response.ok) {
        const errorText = await response.text();
        throw new HttpStatusError(response.status, response.statusText, parseBody(errorText));
      }

      const data = parseBody(await response.text());
      if (!isJsonObject(data)) {
        throw new Error('Response body is not a JSON object');
      }
      return data;
    } finally {
      clearTimeout(timeout);
    }
  }
}
