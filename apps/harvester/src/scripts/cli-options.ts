import { Command } from 'commander';
import type { HarvestOptions } from '@mustplay/shared-types';
import { normalizeHarvestOptions } from '../config/harvest.config';

export interface HarvestArgs {
  options: HarvestOptions;
  output?: string;
}

// Bad values come back as undefined and the configured default is used
function integerArg(value: string): number | undefined {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function numberArg(value: string): number | undefined {
  const parsed = Number(value);
  return value.trim() !== '' && Number.isFinite(parsed) ? parsed : undefined;
}

// A flag given without a value parses as `true`
function given<T extends number | string>(value: T | boolean | undefined): T | undefined {
  return typeof value === 'boolean' ? undefined : value;
}

export function parseHarvestArgs(argv: string[], defaults: HarvestOptions): HarvestArgs {
  const program = new Command()
    .name('harvest')
    .description('Scrape the must-play games of the Metacritic catalog into a CSV file')
    .option('--start [page]', 'first catalog page', integerArg)
    .option('--end [page]', 'last catalog page (inclusive)', integerArg)
    .option('--output [file]', 'CSV file to write')
    .option('--delay [seconds]', 'base pause after each successful page', numberArg)
    .option('--concurrency [n]', 'pages fetched at the same time', integerArg)
    .allowUnknownOption()
    .allowExcessArguments()
    .parse(argv, { from: 'user' });

  const opts = program.opts<{
    start?: number | boolean;
    end?: number | boolean;
    output?: string | boolean;
    delay?: number | boolean;
    concurrency?: number | boolean;
  }>();

  return {
    options: normalizeHarvestOptions(
      {
        startPage: given(opts.start) ?? defaults.startPage,
        endPage: given(opts.end) ?? defaults.endPage,
        delaySeconds: given(opts.delay) ?? defaults.delaySeconds,
        concurrency: given(opts.concurrency) ?? defaults.concurrency,
      },
      defaults
    ),
    output: given(opts.output) || undefined,
  };
}

export function parseAnalyzeArgs(argv: string[]): { csvFile?: string } {
  const program = new Command()
    .name('analyze')
    .description('Compute must-play statistics from a CSV file and update the README')
    .argument('[csv]', 'CSV file to analyze (defaults to the newest one)')
    .allowUnknownOption()
    .allowExcessArguments()
    .parse(argv, { from: 'user' });

  const csvFile = program.args[0];
  return { csvFile: csvFile ? csvFile : undefined };
}
