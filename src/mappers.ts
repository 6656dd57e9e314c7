import type { ImageRecord, JsonObject, JsonValue, SearchResultSet } from './types.js';
import { ImageMappingError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { isJsonObject } from './utils.js';

// Raw fields with a typed counterpart on ImageRecord
const KNOWN_IMAGE_FIELDS = new Set([
  'contentUrl',
  'name',
  'width',
  'height',
  'contentSize',
  'encodingFormat',
  'hostPageUrl',
  'thumbnailUrl',
  'datePublished',
  'contentType',
  'accentColor',
]);

const CONTENT_SIZE_PATTERN = /^\s*(\d+)\s*B\s*$/;

// Date, optional time with fraction, optional offset. A trailing "Z" is stripped beforehand.
const ISO_DATE_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?)?([+-]\d{2}:\d{2})?$/;

const optionalString = (value: JsonValue | undefined): string | undefined =>
  typeof value === 'string' ? value : undefined;

function dimension(value: JsonValue | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.trunc(value);
}

/**
 * "102400 B" -> 102400, 204800 -> 204800, anything else -> null
 */
export function parseContentSize(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string') {
    const match = CONTENT_SIZE_PATTERN.exec(value);
    return match ? Number.parseInt(match[1], 10) : null;
  }
  return null;
}

// Date.parse rolls overflowing days forward (2023-02-30 -> 2023-03-02)
function isCalendarDate(date: string): boolean {
  const midnight = Date.parse(`${date}T00:00:00Z`);
  return !Number.isNaN(midnight) && new Date(midnight).toISOString().slice(0, 10) === date;
}

// Date.parse also takes 24:00 as the next midnight
function isClockTime(hoursMinutes: string | undefined, seconds: string | undefined): boolean {
  const [hours, minutes] = (hoursMinutes ?? '00:00').split(':').map(Number);
  return hours <= 23 && minutes <= 59 && Number(seconds ?? '0') <= 59;
}

/**
 * Parse `datePublished`. Values without an offset are read as UTC.
 */
export function parsePublishedDate(value: JsonValue | undefined): Date | null {
  if (typeof value !== 'string') return null;

  const match = ISO_DATE_PATTERN.exec(value.replace(/Z+$/, ''));
  if (!match) return null;

  const [, date, hoursMinutes, seconds, fraction, offset] = match;
  const millis = (fraction ?? '').padEnd(3, '0').slice(0, 3);
  const normalized = `${date}T${hoursMinutes ?? '00:00'}:${seconds ?? '00'}.${millis}${offset ?? 'Z'}`;

  const time = Date.parse(normalized);
  if (Number.isNaN(time) || !isCalendarDate(date) || !isClockTime(hoursMinutes, seconds)) return null;
  return new Date(time);
}

/**
 * Convert one raw API image object into an ImageRecord.
 * Missing or malformed fields fall back to defaults.
 */
export function mapImage(raw: JsonObject): ImageRecord {
  const extras = Object.fromEntries(Object.entries(raw).filter(([key]) => !KNOWN_IMAGE_FIELDS.has(key)));

  return {
    contentUrl: optionalString(raw.contentUrl) ?? '',
    name: optionalString(raw.name) ?? '',
    width: dimension(raw.width),
    height: dimension(raw.height),
    contentSize: parseContentSize(raw.contentSize),
    encodingFormat: optionalString(raw.encodingFormat),
    hostPageUrl: optionalString(raw.hostPageUrl),
    thumbnailUrl: optionalString(raw.thumbnailUrl),
    createdDate: parsePublishedDate(raw.datePublished),
    contentType: optionalString(raw.contentType),
    accentColor: optionalString(raw.accentColor),
    extras,
  };
}

export function meetsSizeRequirements(image: ImageRecord, minWidth: number, minHeight: number): boolean {
  return image.width >= minWidth && image.height >= minHeight;
}

function toImageRecord(item: JsonValue, index: number): ImageRecord {
  if (!isJsonObject(item)) {
    const kind = Array.isArray(item) ? 'array' : item === null ? 'null' : typeof item;
    throw new ImageMappingError(`Item ${index} is not an object (got ${kind})`);
  }
  return mapImage(item);
}

/**
 * Convert a full API response page into a SearchResultSet.
 * Items that cannot be mapped are logged and skipped.
 */
export function mapResult(query: string, raw: JsonObject, logger: Logger = defaultLogger): SearchResultSet {
  const value = raw.value;
  const items = Array.isArray(value) ? value : [];
  const images: ImageRecord[] = [];

  items.forEach((item, index) => {
    try {
      images.push(toImageRecord(item, index));
    } catch (error) {
      logger.warn(`Skipping image that could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
    }
  });

  const totalEstimatedMatches = typeof raw.totalEstimatedMatches === 'number' ? raw.totalEstimatedMatches : 0;

  // Absence of the key, not a null value, marks the last page
  if ('nextOffset' in raw && typeof raw.nextOffset === 'number') {
    return { query, images, nextOffset: raw.nextOffset, totalEstimatedMatches };
  }
  return { query, images, totalEstimatedMatches };
}

/**
 * Keep only images at least `minWidth` x `minHeight`; everything else is carried over
 */
export function filterBySize(result: SearchResultSet, minWidth: number, minHeight: number): SearchResultSet {
  return {
    ...result,
    images: result.images.filter(image => meetsSizeRequirements(image, minWidth, minHeight)),
  };
}

export interface SerializedImage {
  contentUrl: string;
  name: string;
  width: number;
  height: number;
  contentSize: number | null;
  encodingFormat: string | null;
  hostPageUrl: string | null;
  thumbnailUrl: string | null;
  createdDate: string | null;
  contentType: string | null;
  accentColor: string | null;
}

/**
 * Plain JSON representation of an image (extras are left out)
 */
export function serializeImage(image: ImageRecord): SerializedImage {
  return {
    contentUrl: image.contentUrl,
    name: image.name,
    width: image.width,
    height: image.height,
    contentSize: image.contentSize,
    encodingFormat: image.encodingFormat ?? null,
    hostPageUrl: image.hostPageUrl ?? null,
    thumbnailUrl: image.thumbnailUrl ?? null,
    createdDate: image.createdDate ? image.createdDate.toISOString() : null,
    contentType: image.contentType ?? null,
    accentColor: image.accentColor ?? null,
  };
}
