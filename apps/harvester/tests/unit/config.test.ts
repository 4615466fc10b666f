/**
 * Unit tests for configuration loading and option normalisation
 */

import {
  DEFAULT_HARVEST_OPTIONS,
  loadConfig,
  normalizeHarvestOptions,
  validateConfig,
} from '../../src/config/harvest.config';
import { HarvestError } from '../../src/utils/errors';

describe('harvest.config', () => {
  describe('loadConfig', () => {
    test('uses defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config.harvest).toEqual({ startPage: 1, endPage: 16, delaySeconds: 1, concurrency: 1 });
      expect(config.catalog).toEqual({
        baseUrl: 'https://www.metacritic.com',
        userAgent: 'Mozilla/5.0',
        releaseYearMin: 1958,
        releaseYearMax: 2025,
        timeout: 30000,
        maxRetries: 0,
      });
      expect(config.outputDir).toBe('.');
      expect(config.logLevel).toBe('debug');
    });

    test('reads harvest settings from the environment', () => {
      const config = loadConfig({
        NODE_ENV: 'production',
        HARVEST_START_PAGE: '3',
        HARVEST_END_PAGE: '9',
        HARVEST_DELAY_SECONDS: '0.5',
        HARVEST_CONCURRENCY: '4',
        HTTP_MAX_RETRIES: '2',
      });

      expect(config.harvest).toEqual({ startPage: 3, endPage: 9, delaySeconds: 0.5, concurrency: 4 });
      expect(config.catalog.maxRetries).toBe(2);
      expect(config.logLevel).toBe('info');
    });

    test('silently falls back on unusable values', () => {
      const config = loadConfig({
        HARVEST_START_PAGE: 'first',
        HARVEST_END_PAGE: '0',
        HARVEST_DELAY_SECONDS: '-2',
        HARVEST_CONCURRENCY: '2.5',
        HTTP_MAX_RETRIES: '-1',
      });

      expect(config.harvest).toEqual(DEFAULT_HARVEST_OPTIONS);
      expect(config.catalog.maxRetries).toBe(0);
    });
  });

  describe('normalizeHarvestOptions', () => {
    test('keeps valid values', () => {
      expect(normalizeHarvestOptions({ startPage: 2, endPage: 5, delaySeconds: 0, concurrency: 8 })).toEqual({
        startPage: 2,
        endPage: 5,
        delaySeconds: 0,
        concurrency: 8,
      });
    });

    test('keeps an end page before the start page as an empty range', () => {
      expect(normalizeHarvestOptions({ startPage: 5, endPage: 2 })).toMatchObject({ startPage: 5, endPage: 2 });
    });

    test('fills missing values from the given defaults', () => {
      const defaults = { startPage: 4, endPage: 6, delaySeconds: 2, concurrency: 3 };
      expect(normalizeHarvestOptions({ concurrency: 0 }, defaults)).toEqual(defaults);
    });
  });

  describe('validateConfig', () => {
    test('accepts the defaults', () => {
      expect(() => validateConfig(loadConfig({}))).not.toThrow();
    });

    test('rejects a malformed catalog URL', () => {
      expect(() => validateConfig(loadConfig({ CATALOG_BASE_URL: 'not a url' }))).toThrow(
        'CATALOG_BASE_URL is not a valid URL: not a url'
      );
    });

    test('rejects a non-http catalog URL', () => {
      expect(() => validateConfig(loadConfig({ CATALOG_BASE_URL: 'ftp://catalog.test' }))).toThrow(
        'CATALOG_BASE_URL must use http or https'
      );
    });

    test('rejects an inverted release year filter', () => {
      const config = loadConfig({ CATALOG_RELEASE_YEAR_MIN: '2030', CATALOG_RELEASE_YEAR_MAX: '2000' });
      expect(() => validateConfig(config)).toThrow('CATALOG_RELEASE_YEAR_MIN must not be greater');
    });

    test('tags failures with the config service', () => {
      let thrown: unknown;
      try {
        validateConfig(loadConfig({ CATALOG_BASE_URL: 'not a url' }));
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(HarvestError);
      expect(thrown).toHaveProperty('service', 'config');
    });
  });
});
