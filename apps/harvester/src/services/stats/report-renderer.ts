import type { GameRecord, SeriesEntry, StatsReport } from '@mustplay/shared-types';
import { formatIsoDate } from '../../utils/coerce';

export const STATS_START = '<!-- STATS_START -->';
export const STATS_END = '<!-- STATS_END -->';

const GOTY_MARK = ' 🌟 *Possible GOTY*';

export interface RecentGroup {
  year: number;
  /** Mean over the records of the year that have a score. */
  averageMetascore?: number;
  games: { record: GameRecord; possibleGoty: boolean }[];
}

function titleOf(record: GameRecord): string {
  return record.title ?? '—';
}

function dateOf(record: GameRecord): string {
  return record.releaseDate ? formatIsoDate(record.releaseDate) : '??';
}

function scoreOf(record: GameRecord): string {
  return record.metascore !== undefined ? String(record.metascore) : 'N/A';
}

function averageOf(records: readonly GameRecord[]): number | undefined {
  const scores = records.flatMap((record) => (record.metascore !== undefined ? [record.metascore] : []));
  if (scores.length === 0) return undefined;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

function yearSummary(group: RecentGroup): string {
  const count = group.games.length;
  const average = group.averageMetascore !== undefined ? group.averageMetascore.toFixed(1) : 'N/A';
  return `${count} ${count === 1 ? 'game' : 'games'} | Avg Metascore: ${average}`;
}

export function seriesToMarkdown(series: readonly SeriesEntry[]): string {
  return series.map(({ key, count }) => `${key}: ${count}`).join('\n');
}

/**
 * Groups recent records by year (ascending), best score first within a
 * year. The leader of each year is flagged; the records are left untouched.
 */
export function groupRecent(records: readonly GameRecord[]): RecentGroup[] {
  const byYear = new Map<number, GameRecord[]>();
  for (const record of records) {
    if (!record.releaseDate) continue;
    const year = record.releaseDate.getUTCFullYear();
    const group = byYear.get(year);
    if (group) {
      group.push(record);
    } else {
      byYear.set(year, [record]);
    }
  }

  return Array.from(byYear.keys())
    .sort((a, b) => a - b)
    .map((year) => {
      const ordered = [...(byYear.get(year) ?? [])].sort(
        (a, b) => (b.metascore ?? 0) - (a.metascore ?? 0)
      );
      return {
        year,
        averageMetascore: averageOf(ordered),
        games: ordered.map((record, i) => ({ record, possibleGoty: i === 0 })),
      };
    });
}

export function recentToMarkdown(records: readonly GameRecord[]): string {
  const lines: string[] = [];
  for (const group of groupRecent(records)) {
    lines.push(`#### ${group.year}`);
    lines.push(yearSummary(group));
    for (const { record, possibleGoty } of group.games) {
      const line = `- **${titleOf(record)}** (${dateOf(record)}) — Metascore: ${scoreOf(record)}`;
      lines.push(possibleGoty ? line + GOTY_MARK : line);
    }
    lines.push('');
  }
  return lines.join('\n');
}

function highlight(record: GameRecord | undefined): string {
  if (!record) return '- N/A';
  return `- ${titleOf(record)} (${dateOf(record)}) — Metascore ${scoreOf(record)}`;
}

export function renderStatsBlock(stats: StatsReport): string {
  return [
    STATS_START,
    `🎮 **Total must-play games:** ${stats.total}`,
    '',
    '### Games by decade',
    seriesToMarkdown(stats.byDecade),
    '',
    '### Top 5 years (most must-plays)',
    seriesToMarkdown(stats.topYears),
    '',
    '### Metascore distribution',
    seriesToMarkdown(stats.scoreDistribution),
    '',
    '### Oldest must-play game',
    highlight(stats.oldest),
    '',
    '### Newest must-play game',
    highlight(stats.newest),
    '',
    `### Must-plays released 2020+ (${stats.recent.length})`,
    recentToMarkdown(stats.recent),
    STATS_END,
    '',
  ].join('\n');
}

/**
 * Puts a rendered block into `document`. An existing marker pair and
 * everything between them is replaced in place; without both markers the
 * block is appended. Running it again with the same block changes nothing.
 */
export function spliceStatsBlock(document: string, block: string): string {
  const framed = block.includes(STATS_START) ? block : `${STATS_START}\n${block.trimEnd()}\n${STATS_END}\n`;

  const start = document.indexOf(STATS_START);
  const end = start >= 0 ? document.indexOf(STATS_END, start + STATS_START.length) : -1;

  if (start >= 0 && end >= 0) {
    const endOfFrame = framed.lastIndexOf(STATS_END);
    const region = endOfFrame >= 0 ? framed.slice(0, endOfFrame + STATS_END.length) : framed;
    return document.slice(0, start) + region + document.slice(end + STATS_END.length);
  }

  return `${document.trimEnd()}\n\n${framed}`;
}
