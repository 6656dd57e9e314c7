import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';

export const DEFAULT_ENDPOINT = 'https://api.bing.microsoft.com/v7.0/images/search';
export const DEFAULT_REQUEST_DELAY = 1.0;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * TypeBox schema for client and CLI configuration.
 * The API key is NOT included here (it is loaded separately).
 */
export const ConfigSchema = Type.Object({
  endpoint: Type.String({
    default: DEFAULT_ENDPOINT,
    minLength: 1,
    description: 'Bing Image Search v7 endpoint'
  }),
  requestDelay: Type.Number({
    default: DEFAULT_REQUEST_DELAY,
    minimum: 0,
    description: 'Minimum delay between requests in seconds'
  }),
  maxRetries: Type.Integer({
    default: DEFAULT_MAX_RETRIES,
    minimum: 1,
    description: 'Attempts per request, including the first'
  }),
  maxImagesPerSearch: Type.Integer({
    default: 100,
    minimum: 1,
    description: 'Default number of images collected by a paginated search'
  }),
  defaultMinWidth: Type.Integer({
    default: 400,
    minimum: 0,
    description: 'Default minimum image width in pixels'
  }),
  defaultMinHeight: Type.Integer({
    default: 400,
    minimum: 0,
    description: 'Default minimum image height in pixels'
  })
});

export type Config = Static<typeof ConfigSchema>;
