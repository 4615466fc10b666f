import type { GameRecord } from './games';

export interface SeriesEntry {
  key: number;
  count: number;
}

/**
 * Snapshot of aggregate statistics over a record collection.
 * Series are arrays rather than objects so their order survives.
 */
export interface StatsReport {
  readonly total: number;
  readonly byDecade: readonly SeriesEntry[]; // ascending by decade
  readonly topYears: readonly SeriesEntry[]; // descending by count, at most 5
  readonly scoreDistribution: readonly SeriesEntry[]; // ascending by score
  readonly oldest?: GameRecord;
  readonly newest?: GameRecord;
  readonly recent: readonly GameRecord[]; // released 2020 or later
}
