import type { PageFetchResult } from '@mustplay/shared-types';

export interface PageSource {
  buildPageUrl(page: number): string;
  fetchPage(page: number): Promise<PageFetchResult>;
}

export interface PacingOptions {
  delaySeconds: number;
  random?: () => number; // uniform in [0, 1)
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wraps a page source with the post-success pause.
 * A fetch counts as finished only once the pause is over, so the pause
 * holds its concurrency slot.
 */
export class PageFetcher {
  private delaySeconds: number;
  private random: () => number;
  private sleep: (ms: number) => Promise<void>;

  constructor(private source: PageSource, options: PacingOptions) {
    this.delaySeconds = options.delaySeconds;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
  }

  buildPageUrl(page: number): string {
    return this.source.buildPageUrl(page);
  }

  pauseMs(): number {
    return Math.round((this.delaySeconds + this.random()) * 1000);
  }

  async fetch(page: number): Promise<PageFetchResult> {
    const result = await this.source.fetchPage(page);
    if (result.ok) {
      await this.sleep(this.pauseMs());
    }
    return result;
  }
}
