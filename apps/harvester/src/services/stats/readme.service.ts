import fs from 'fs';
import type { GameRecord, StatsReport } from '@mustplay/shared-types';
import { computeStats } from './aggregator';
import { renderStatsBlock, spliceStatsBlock } from './report-renderer';
import { README_TEMPLATE } from '../../utils/files';

export interface StatsUpdate {
  stats: StatsReport;
  block: string;
  document: string;
  changed: boolean;
}

export function buildStatsUpdate(records: readonly GameRecord[], currentDocument: string): StatsUpdate {
  const stats = computeStats(records);
  const block = renderStatsBlock(stats);
  const document = spliceStatsBlock(currentDocument, block);
  return { stats, block, document, changed: document !== currentDocument };
}

/**
 * Splices fresh statistics into the README, rewriting the whole file once.
 */
export function updateReadme(readmePath: string, records: readonly GameRecord[]): StatsUpdate {
  const current = fs.existsSync(readmePath) ? fs.readFileSync(readmePath, 'utf-8') : README_TEMPLATE;
  const update = buildStatsUpdate(records, current);
  fs.writeFileSync(readmePath, update.document, 'utf-8');
  return update;
}
