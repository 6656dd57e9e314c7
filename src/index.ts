export { ImageSearchClient, MAX_COUNT_PER_REQUEST } from './search-client.js';
export type { SearchClientDependencies } from './search-client.js';
export { RateLimiter } from './rate-limiter.js';
export {
  mapImage,
  mapResult,
  filterBySize,
  meetsSizeRequirements,
  serializeImage,
  parseContentSize,
  parsePublishedDate,
} from './mappers.js';
export type { SerializedImage } from './mappers.js';
export {
  classifyError,
  ImageSearchApiError,
  AuthenticationError,
  RateLimitError,
  SearchError,
  HttpStatusError,
  ConfigurationError,
  ImageMappingError,
} from './errors.js';
export { ConfigSchema, DEFAULT_ENDPOINT } from './config.js';
export type { Config } from './config.js';
export { loadConfig, loadApiKeys, loadEnvFile, validateConfig, createClientSettings } from './config-loader.js';
export { logger } from './logger.js';
export type { Logger } from './logger.js';
export { SAFE_SEARCH_LEVELS, IMAGE_TYPES } from './types.js';
export type {
  ApiKeys,
  Clock,
  ExtraParams,
  FetchFn,
  ImageRecord,
  ImageType,
  JsonObject,
  JsonValue,
  SafeSearch,
  SearchAllOptions,
  SearchClientSettings,
  SearchOptions,
  SearchResultSet,
} from './types.js';
export { VERSION } from './version.js';
