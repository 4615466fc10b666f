import type { GameRecord, SeriesEntry, StatsReport } from '@mustplay/shared-types';

export const RECENT_FROM_YEAR = 2020;
export const TOP_YEARS = 5;

function increment(counts: Map<number, number>, key: number): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function toSeries(counts: Map<number, number>): SeriesEntry[] {
  return Array.from(counts, ([key, count]) => ({ key, count }));
}

function sortedByKey(counts: Map<number, number>): SeriesEntry[] {
  return toSeries(counts).sort((a, b) => a.key - b.key);
}

/**
 * Years with the most records. Equal counts keep the order in which the
 * years were first met in the input, not numeric order.
 */
export function topYears(byYear: Map<number, number>, limit: number = TOP_YEARS): SeriesEntry[] {
  return toSeries(byYear)
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function computeStats(records: readonly GameRecord[]): StatsReport {
  const byYear = new Map<number, number>();
  const byDecade = new Map<number, number>();
  const byScore = new Map<number, number>();
  const recent: GameRecord[] = [];

  for (const record of records) {
    if (record.releaseDate) {
      const year = record.releaseDate.getUTCFullYear();
      increment(byYear, year);
      increment(byDecade, Math.floor(year / 10) * 10);
      if (year >= RECENT_FROM_YEAR) recent.push(record);
    }
    if (record.metascore !== undefined) {
      increment(byScore, record.metascore);
    }
  }

  let oldest: GameRecord | undefined;
  let newest: GameRecord | undefined;
  for (const record of records) {
    if (!record.releaseDate) continue;
    const time = record.releaseDate.getTime();
    if (!oldest?.releaseDate || time < oldest.releaseDate.getTime()) oldest = record;
    if (!newest?.releaseDate || time > newest.releaseDate.getTime()) newest = record;
  }

  return Object.freeze({
    total: records.length,
    byDecade: sortedByKey(byDecade),
    topYears: topYears(byYear),
    scoreDistribution: sortedByKey(byScore),
    oldest,
    newest,
    recent,
  });
}
