import fs from 'fs';
import path from 'path';
import { formatIsoDate } from './coerce';

export const DEFAULT_README = 'README.md';
export const README_TEMPLATE = '# Metacritic Must-play dataset\n\n';

export function defaultOutputPath(date: Date = new Date(), dir: string = '.'): string {
  const day = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
  return path.join(dir, `metacritic_must_play_${formatIsoDate(day)}.csv`);
}

/**
 * Most recently modified *.csv directly inside `dir`.
 */
export function findLatestCsv(dir: string): string | undefined {
  if (!fs.existsSync(dir)) return undefined;

  const candidates = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.csv'))
    .map((entry) => {
      const filePath = path.join(dir, entry.name);
      return { filePath, mtimeMs: fs.statSync(filePath).mtimeMs };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs || a.filePath.localeCompare(b.filePath));

  return candidates[0]?.filePath;
}

/**
 * Newest CSV of the first directory in `dirs` that holds any.
 */
export function findInputCsv(dirs: readonly string[]): string | undefined {
  for (const dir of dirs) {
    const found = findLatestCsv(dir);
    if (found) return found;
  }
  return undefined;
}

export function findReadmePath(dir: string): string {
  if (fs.existsSync(dir)) {
    const readme = fs
      .readdirSync(dir)
      .sort()
      .find((name) => /^README.*\.md$/.test(name));
    if (readme) return path.join(dir, readme);
  }
  return path.join(dir, DEFAULT_README);
}
