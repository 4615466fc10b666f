import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { GAME_CSV_COLUMNS, GameRecord } from '@mustplay/shared-types';
import { cleanText, formatIsoDate, parseIsoDate, parseMetascore } from '../utils/coerce';

export const CSV_NOTICE = '# Data scraped from Metacritic. Licensed under the MIT License.';

type CsvRow = Record<string, unknown>;

// "ReleaseDate", "release_date" and "Release Date" all land on "releasedate"
function normalizeColumn(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function isCsvRow(value: unknown): value is CsvRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeRow(row: CsvRow): Map<string, string> {
  const fields = new Map<string, string>();
  for (const [name, value] of Object.entries(row)) {
    if (typeof value === 'string') fields.set(normalizeColumn(name), value);
  }
  return fields;
}

function stripLeadingComments(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/^(?:#[^\n]*(?:\n|$))+/, '');
}

export function serializeGamesCsv(records: readonly GameRecord[]): string {
  const rows = records.map((record) => [
    record.rank ?? '',
    record.title ?? '',
    record.releaseDate ? formatIsoDate(record.releaseDate) : '',
    record.metascore !== undefined ? String(record.metascore) : '',
    record.url ?? '',
  ]);

  return `${CSV_NOTICE}\n${stringify([[...GAME_CSV_COLUMNS], ...rows])}`;
}

export function writeGamesCsv(records: readonly GameRecord[], filePath: string): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, serializeGamesCsv(records), 'utf-8');
  return resolved;
}

/**
 * Reads records back from CSV text. Column names are matched loosely,
 * unknown columns are ignored and short rows leave fields empty.
 */
export function parseGamesCsv(text: string): GameRecord[] {
  const parsed: unknown = parse(stripLeadingComments(text), {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  const rows: unknown[] = Array.isArray(parsed) ? parsed : [];

  return rows
    .filter(isCsvRow)
    .map(normalizeRow)
    .map((fields) =>
      Object.freeze({
        rank: cleanText(fields.get('rank')),
        title: cleanText(fields.get('title')),
        releaseDate: parseIsoDate(fields.get('releasedate')),
        metascore: parseMetascore(fields.get('metascore')),
        url: cleanText(fields.get('url')),
      })
    );
}

export function loadGamesCsv(filePath: string): GameRecord[] {
  return parseGamesCsv(fs.readFileSync(filePath, 'utf-8'));
}
