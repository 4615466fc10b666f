import dotenv from 'dotenv';
import type { HarvestOptions } from '@mustplay/shared-types';
import { HarvestError } from '../utils/errors';

// Load environment variables
dotenv.config();

export interface CatalogConfig {
  baseUrl: string;
  userAgent: string;
  releaseYearMin: number;
  releaseYearMax: number;
  timeout: number;
  maxRetries: number;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  outputDir: string;
  catalog: CatalogConfig;
  harvest: HarvestOptions;
}

export const DEFAULT_HARVEST_OPTIONS: Readonly<HarvestOptions> = {
  startPage: 1,
  endPage: 16,
  delaySeconds: 1.0,
  concurrency: 1,
};

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function parseInteger(value: string | undefined, defaultValue: number): number {
  const parsed = parseNumber(value, defaultValue);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

/**
 * Replaces out-of-range harvest values with their defaults.
 * Bad input never aborts a run, it is ignored instead.
 */
export function normalizeHarvestOptions(
  options: Partial<HarvestOptions>,
  defaults: HarvestOptions = DEFAULT_HARVEST_OPTIONS
): HarvestOptions {
  const isCount = (value: number | undefined): value is number =>
    value !== undefined && Number.isInteger(value) && value >= 1;

  const startPage = isCount(options.startPage) ? options.startPage : defaults.startPage;
  // end < start is kept: it is an empty range, not an invalid one
  const endPage = isCount(options.endPage) ? options.endPage : defaults.endPage;
  const delaySeconds =
    options.delaySeconds !== undefined && Number.isFinite(options.delaySeconds) && options.delaySeconds >= 0
      ? options.delaySeconds
      : defaults.delaySeconds;
  const concurrency = isCount(options.concurrency) ? options.concurrency : defaults.concurrency;

  return { startPage, endPage, delaySeconds, concurrency };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    outputDir: env.HARVEST_OUTPUT_DIR || '.',

    catalog: {
      baseUrl: env.CATALOG_BASE_URL || 'https://www.metacritic.com',
      userAgent: env.CATALOG_USER_AGENT || 'Mozilla/5.0',
      releaseYearMin: parseInteger(env.CATALOG_RELEASE_YEAR_MIN, 1958),
      releaseYearMax: parseInteger(env.CATALOG_RELEASE_YEAR_MAX, 2025),
      timeout: parseInteger(env.HTTP_TIMEOUT_MS, 30000),
      maxRetries: Math.max(0, parseInteger(env.HTTP_MAX_RETRIES, 0)),
    },

    harvest: normalizeHarvestOptions({
      startPage: parseInteger(env.HARVEST_START_PAGE, DEFAULT_HARVEST_OPTIONS.startPage),
      endPage: parseInteger(env.HARVEST_END_PAGE, DEFAULT_HARVEST_OPTIONS.endPage),
      delaySeconds: parseNumber(env.HARVEST_DELAY_SECONDS, DEFAULT_HARVEST_OPTIONS.delaySeconds),
      concurrency: parseInteger(env.HARVEST_CONCURRENCY, DEFAULT_HARVEST_OPTIONS.concurrency),
    }),
  };
}

export function validateConfig(config: AppConfig): void {
  let origin: URL;
  try {
    origin = new URL(config.catalog.baseUrl);
  } catch {
    throw new HarvestError(`CATALOG_BASE_URL is not a valid URL: ${config.catalog.baseUrl}`, 'config');
  }
  if (origin.protocol !== 'http:' && origin.protocol !== 'https:') {
    throw new HarvestError(`CATALOG_BASE_URL must use http or https: ${config.catalog.baseUrl}`, 'config');
  }
  if (config.catalog.releaseYearMin > config.catalog.releaseYearMax) {
    throw new HarvestError('CATALOG_RELEASE_YEAR_MIN must not be greater than CATALOG_RELEASE_YEAR_MAX', 'config');
  }
}

export const config = loadConfig();
