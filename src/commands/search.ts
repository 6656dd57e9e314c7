import type { Config } from '../config.js';
import type { ImageType, SafeSearch, SearchResultSet } from '../types.js';
import type { ImageSearchClient } from '../search-client.js';
import { classifyError, HttpStatusError } from '../errors.js';
import { filterBySize, serializeImage } from '../mappers.js';
import { logger } from '../logger.js';
import { sanitizeErrorForResponse } from '../utils.js';

export interface SearchCommandOptions {
  maxImages?: number;
  market?: string;
  safeSearch?: SafeSearch;
  imageType?: ImageType;
  filter?: string;
  minWidth?: number;
  minHeight?: number;
  json?: boolean;
}

type Output = (line: string) => void;

export function formatResult(result: SearchResultSet, json: boolean): string[] {
  if (json) {
    return [JSON.stringify(result.images.map(serializeImage), null, 2)];
  }
  return result.images.map(image => `${image.width}x${image.height} ${image.contentUrl}`);
}

/**
 * Run a paginated search, filter by size and print the images.
 * Returns the process exit code.
 */
export async function searchCommand(
  client: Pick<ImageSearchClient, 'searchAll'>,
  config: Config,
  query: string,
  options: SearchCommandOptions,
  output: Output = line => console.log(line),
): Promise<number> {
  const maxImages = options.maxImages ?? config.maxImagesPerSearch;
  const minWidth = options.minWidth ?? config.defaultMinWidth;
  const minHeight = options.minHeight ?? config.defaultMinHeight;

  try {
    const result = await client.searchAll(query, maxImages, {
      market: options.market,
      safeSearch: options.safeSearch,
      imageType: options.imageType,
      filter: options.filter,
    });

    const filtered = filterBySize(result, minWidth, minHeight);
    for (const line of formatResult(filtered, options.json ?? false)) {
      output(line);
    }

    const dropped = result.images.length - filtered.images.length;
    logger.success(
      `${filtered.images.length} images for '${query}' (${dropped} smaller than ${minWidth}x${minHeight}, ` +
      `~${result.totalEstimatedMatches} estimated matches)`
    );
    return 0;
  } catch (error) {
    if (error instanceof HttpStatusError) {
      logger.error(sanitizeErrorForResponse(classifyError(error.status, error.body)));
    } else {
      logger.error(`Search failed: ${sanitizeErrorForResponse(error)}`);
    }
    return 1;
  }
}
