import axios, { AxiosAdapter } from 'axios';
import type { PageFetchResult } from '@mustplay/shared-types';
import { HttpClient } from './base/HttpClient';
import type { CatalogConfig } from '../config/harvest.config';
import { describeError } from '../utils/errors';

export interface CatalogClientOptions {
  adapter?: AxiosAdapter;
  now?: () => number;
  retryBaseDelayMs?: number;
}

/**
 * Metacritic game catalog.
 * Listing pages are server-rendered, one page per request.
 */
export class CatalogClient extends HttpClient {
  readonly origin: string;
  private releaseYearMin: number;
  private releaseYearMax: number;
  private now: () => number;

  constructor(catalog: CatalogConfig, options: CatalogClientOptions = {}) {
    super(
      {
        baseUrl: catalog.baseUrl,
        timeout: catalog.timeout,
        maxRetries: catalog.maxRetries,
        retryBaseDelayMs: options.retryBaseDelayMs,
        headers: { 'User-Agent': catalog.userAgent },
        adapter: options.adapter,
      },
      'catalog'
    );
    this.origin = catalog.baseUrl.replace(/\/+$/, '');
    this.releaseYearMin = catalog.releaseYearMin;
    this.releaseYearMax = catalog.releaseYearMax;
    this.now = options.now ?? Date.now;
  }

  buildPagePath(page: number): string {
    return `/browse/game/?releaseYearMin=${this.releaseYearMin}&releaseYearMax=${this.releaseYearMax}&page=${page}`;
  }

  buildPageUrl(page: number): string {
    return this.origin + this.buildPagePath(page);
  }

  /**
   * Downloads one listing page. Failures are reported in the result, never thrown.
   */
  async fetchPage(page: number): Promise<PageFetchResult> {
    const url = this.buildPageUrl(page);
    const startedAt = this.now();

    try {
      const response = await this.getText(this.buildPagePath(page));
      return {
        page,
        url,
        ok: true,
        status: response.status,
        body: response.data,
        elapsedMs: this.now() - startedAt,
        bytes: Buffer.byteLength(response.data, 'utf8'),
      };
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      return {
        page,
        url,
        ok: false,
        status,
        elapsedMs: this.now() - startedAt,
        bytes: 0,
        error: status !== undefined ? `HTTP ${status}` : describeError(error),
      };
    }
  }
}
