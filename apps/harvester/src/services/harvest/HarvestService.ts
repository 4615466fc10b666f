import { EventEmitter } from 'events';
import type {
  GameRecord,
  HarvestEventMap,
  HarvestOptions,
  HarvestResult,
  PageFetchResult,
  PageOutcome,
} from '@mustplay/shared-types';
import { PageFetcher, PacingOptions, PageSource } from './PageFetcher';
import { schedulePages } from './FetchScheduler';
import { extractGames } from './RecordExtractor';
import { collatePages, sortByRank } from './Collator';

export interface HarvestService {
  on<E extends keyof HarvestEventMap>(event: E, listener: (payload: HarvestEventMap[E]) => void): this;
  once<E extends keyof HarvestEventMap>(event: E, listener: (payload: HarvestEventMap[E]) => void): this;
  emit<E extends keyof HarvestEventMap>(event: E, payload: HarvestEventMap[E]): boolean;
}

/**
 * Fetch, extract and collate the must-play listing over a page range.
 * Never logs: progress goes out as events for whoever subscribes.
 */
export class HarvestService extends EventEmitter {
  constructor(
    private source: PageSource & { origin: string },
    private pacing: Omit<PacingOptions, 'delaySeconds'> = {}
  ) {
    super();
  }

  async run(options: HarvestOptions): Promise<HarvestResult> {
    this.emit('harvest:start', options);

    const fetcher = new PageFetcher(this.source, { ...this.pacing, delaySeconds: options.delaySeconds });

    const fetched = await schedulePages(
      options.startPage,
      options.endPage,
      async (page) => {
        const result = await fetcher.fetch(page);
        this.emit('page:done', result);
        return result;
      },
      {
        concurrency: options.concurrency,
        onStart: (page) => this.emit('page:start', { page, url: fetcher.buildPageUrl(page) }),
      }
    );

    const perPage: GameRecord[][] = [];
    const outcomes: PageOutcome[] = [];
    let accumulated = 0;
    let exhaustedAt: number | undefined;

    for (const result of fetched) {
      const outcome = this.processPage(result, accumulated);
      outcomes.push(outcome.summary);

      if (outcome.summary.status === 'empty' && exhaustedAt === undefined) {
        exhaustedAt = result.page;
      }
      if (outcome.records.length > 0) {
        perPage.push(outcome.records);
        accumulated += outcome.records.length;
      }
    }

    const records = sortByRank(collatePages(perPage));

    this.emit('harvest:complete', { total: records.length, pages: outcomes.length, exhaustedAt });

    return { records, pages: outcomes, exhaustedAt };
  }

  private processPage(
    result: PageFetchResult,
    accumulated: number
  ): { summary: PageOutcome; records: GameRecord[] } {
    if (!result.ok || result.body === undefined) {
      this.emit('page:skipped', result);
      return { summary: { page: result.page, status: 'skipped', cardCount: 0, recordCount: 0 }, records: [] };
    }

    const { cardCount, cards } = extractGames(result.body, this.source.origin);

    for (const card of cards) {
      this.emit('record:extracted', { page: result.page, index: card.index, record: card.record });
    }

    if (cards.length === 0) {
      this.emit('page:empty', { page: result.page, cardCount });
      return { summary: { page: result.page, status: 'empty', cardCount, recordCount: 0 }, records: [] };
    }

    const records = cards.map((card) => card.record);
    this.emit('page:extracted', {
      page: result.page,
      cardCount,
      recordCount: records.length,
      accumulated: accumulated + records.length,
    });

    return { summary: { page: result.page, status: 'extracted', cardCount, recordCount: records.length }, records };
  }
}
