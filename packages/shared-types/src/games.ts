/**
 * One must-play entry of the catalog.
 * Every field is optional: a card with a missing sub-element still yields a
 * record, only that field is left out.
 */
export interface GameRecord {
  readonly rank?: string; // as printed on the card, e.g. "12."
  readonly title?: string;
  readonly releaseDate?: Date; // UTC midnight of the release day
  readonly metascore?: number; // 0-100
  readonly url?: string; // absolute
}

export const GAME_CSV_COLUMNS = ['Rank', 'Title', 'ReleaseDate', 'Metascore', 'Url'] as const;
