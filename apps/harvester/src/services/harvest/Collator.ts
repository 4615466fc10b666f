import type { GameRecord } from '@mustplay/shared-types';
import { parseRankValue } from '../../utils/coerce';

export function collatePages(pages: readonly (readonly GameRecord[])[]): GameRecord[] {
  return pages.flatMap((records) => [...records]);
}

/**
 * Ascending by numeric rank. Unreadable ranks count as 0 and so lead the
 * list; equal ranks keep their page order.
 */
export function sortByRank(records: readonly GameRecord[]): GameRecord[] {
  return records
    .map((record, position) => ({ record, position, rank: parseRankValue(record.rank) }))
    .sort((a, b) => a.rank - b.rank || a.position - b.position)
    .map(({ record }) => record);
}
