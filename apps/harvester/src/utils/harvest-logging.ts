import type { Logger } from 'winston';
import type { GameRecord } from '@mustplay/shared-types';
import type { HarvestService } from '../services/harvest/HarvestService';

const TITLE_WIDTH = 45;

export function formatRecordLine(page: number, index: number, record: GameRecord): string {
  const rank = (record.rank ?? '?').padStart(3);
  const title = (record.title ?? '—').slice(0, TITLE_WIDTH).padEnd(TITLE_WIDTH);
  return `➕ [${page}.${index}] Rank ${rank} • ${title} • MS ${record.metascore ?? '?'}`;
}

/**
 * Narrates a harvest run through the logger.
 */
export function attachHarvestLogger(service: HarvestService, logger: Logger): void {
  service.on('harvest:start', (options) => {
    logger.info(
      `🚀 Scraping must-play games: pages ${options.startPage}-${options.endPage}, ` +
        `base delay ${options.delaySeconds}s, concurrency ${options.concurrency}`
    );
  });

  service.on('page:start', ({ page, url }) => {
    logger.info(`➡️  Page ${page}`);
    logger.debug(`[catalog] queued ${url}`);
  });

  service.on('page:done', (result) => {
    const seconds = (result.elapsedMs / 1000).toFixed(2);
    if (result.ok) {
      logger.info(`⬇️  ${result.url} — OK ${seconds}s • ${(result.bytes / 1024).toFixed(1)} KB`);
    } else {
      logger.warn(`⚠️  ${result.url} — ${result.error ?? 'failed'} ${seconds}s`);
    }
  });

  service.on('page:skipped', ({ page }) => {
    logger.warn(`⤬ Page ${page} skipped`);
  });

  service.on('record:extracted', ({ page, index, record }) => {
    logger.debug(formatRecordLine(page, index, record));
  });

  service.on('page:empty', ({ page, cardCount }) => {
    logger.info(`⤬ No must-play among ${cardCount} cards on page ${page}; the listing is likely exhausted`);
  });

  service.on('page:extracted', ({ page, cardCount, recordCount, accumulated }) => {
    logger.info(`✔️  ${recordCount}/${cardCount} must-plays on page ${page} • ${accumulated} so far`);
  });

  service.on('harvest:complete', ({ total, pages }) => {
    logger.info(`✅ Scraping finished: ${total} games from ${pages} pages`);
  });
}
