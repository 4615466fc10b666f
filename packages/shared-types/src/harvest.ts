import type { GameRecord } from './games';

export interface HarvestOptions {
  startPage: number;
  endPage: number;
  delaySeconds: number;
  concurrency: number;
}

export interface PageFetchResult {
  page: number;
  url: string;
  ok: boolean;
  status?: number;
  body?: string;
  elapsedMs: number;
  bytes: number;
  error?: string;
}

export type PageOutcomeStatus = 'extracted' | 'empty' | 'skipped';

export interface PageOutcome {
  page: number;
  status: PageOutcomeStatus;
  cardCount: number;
  recordCount: number;
}

export interface HarvestResult {
  records: GameRecord[];
  pages: PageOutcome[];
  /** First page that fetched fine but held no must-play card. */
  exhaustedAt?: number;
}

export interface RecordExtractedEvent {
  page: number;
  index: number; // 1-based position among all cards of the page
  record: GameRecord;
}

export interface PageExtractedEvent {
  page: number;
  cardCount: number;
  recordCount: number;
  accumulated: number;
}

export interface HarvestEventMap {
  'harvest:start': HarvestOptions;
  'page:start': { page: number; url: string };
  'page:done': PageFetchResult;
  'page:skipped': PageFetchResult;
  'page:empty': { page: number; cardCount: number };
  'record:extracted': RecordExtractedEvent;
  'page:extracted': PageExtractedEvent;
  'harvest:complete': { total: number; pages: number; exhaustedAt?: number };
}
