import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createClientSettings,
  loadApiKeys,
  loadConfig,
  loadEnvFile,
  validateConfig,
} from './config-loader.js';
import { logger } from './logger.js';

const DEFAULTS = {
  endpoint: 'https://api.bing.microsoft.com/v7.0/images/search',
  requestDelay: 1,
  maxRetries: 3,
  maxImagesPerSearch: 100,
  defaultMinWidth: 400,
  defaultMinHeight: 400,
};

describe('config-loader', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      expect(loadConfig({})).toEqual(DEFAULTS);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should convert values read from the environment', () => {
      const config = loadConfig({
        BING_SEARCH_ENDPOINT: 'https://search.example.test/v7.0/images/search',
        DEFAULT_REQUEST_DELAY: '0.5',
        MAX_RETRY_ATTEMPTS: '5',
        MAX_IMAGES_PER_SEARCH: '250',
        DEFAULT_IMAGE_MIN_WIDTH: '640',
        DEFAULT_IMAGE_MIN_HEIGHT: '480',
      });

      expect(config).toEqual({
        endpoint: 'https://search.example.test/v7.0/images/search',
        requestDelay: 0.5,
        maxRetries: 5,
        maxImagesPerSearch: 250,
        defaultMinWidth: 640,
        defaultMinHeight: 480,
      });
    });

    it('should replace invalid values with defaults and warn', () => {
      const config = loadConfig({ MAX_RETRY_ATTEMPTS: 'lots', DEFAULT_REQUEST_DELAY: '2' });

      expect(config.maxRetries).toBe(3);
      expect(config.requestDelay).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith('Some configuration values are invalid and were replaced with defaults');
    });

    it('should treat empty variables as unset', () => {
      expect(loadConfig({ BING_SEARCH_ENDPOINT: '' }).endpoint).toBe(DEFAULTS.endpoint);
    });
  });

  describe('loadApiKeys', () => {
    it('should read the subscription key', () => {
      expect(loadApiKeys({ BING_SEARCH_API_KEY: 'test-key' })).toEqual({ bingSearchApiKey: 'test-key' });
    });

    it('should treat an empty key as missing', () => {
      expect(loadApiKeys({ BING_SEARCH_API_KEY: '' }).bingSearchApiKey).toBeUndefined();
    });
  });

  describe('validateConfig', () => {
    it('should accept a complete configuration', () => {
      expect(validateConfig(DEFAULTS, { bingSearchApiKey: 'test-key' })).toEqual([]);
    });

    it('should report a missing key and endpoint', () => {
      const problems = validateConfig({ ...DEFAULTS, endpoint: '' }, {});

      expect(problems).toEqual([
        'BING_SEARCH_API_KEY is not set in environment or .env file',
        'BING_SEARCH_ENDPOINT is not set in environment or .env file',
      ]);
      expect(logger.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('createClientSettings', () => {
    it('should combine config and key', () => {
      expect(createClientSettings(DEFAULTS, { bingSearchApiKey: 'test-key' })).toEqual({
        apiKey: 'test-key',
        endpoint: DEFAULTS.endpoint,
        requestDelay: 1,
        maxRetries: 3,
      });
    });
  });

  describe('loadEnvFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'image-harvester-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
      delete process.env.IMAGE_HARVESTER_TEST_VALUE;
    });

    it('should load variables from an existing file', () => {
      const path = join(dir, '.env');
      writeFileSync(path, 'IMAGE_HARVESTER_TEST_VALUE=from-file\n');

      expect(loadEnvFile(path)).toBe(true);
      expect(process.env.IMAGE_HARVESTER_TEST_VALUE).toBe('from-file');
    });

    it('should warn when the file does not exist', () => {
      expect(loadEnvFile(join(dir, 'missing.env'))).toBe(false);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });
});
