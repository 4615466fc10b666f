/**
 * Unit tests for command-line parsing
 */

import { DEFAULT_HARVEST_OPTIONS } from '../../src/config/harvest.config';
import { parseAnalyzeArgs, parseHarvestArgs } from '../../src/scripts/cli-options';

describe('parseHarvestArgs', () => {
  test('reads every flag', () => {
    const args = parseHarvestArgs(
      ['--start', '2', '--end', '4', '--delay', '0.5', '--concurrency', '3', '--output', 'out.csv'],
      DEFAULT_HARVEST_OPTIONS
    );

    expect(args).toEqual({
      options: { startPage: 2, endPage: 4, delaySeconds: 0.5, concurrency: 3 },
      output: 'out.csv',
    });
  });

  test('uses the defaults without flags', () => {
    expect(parseHarvestArgs([], DEFAULT_HARVEST_OPTIONS)).toEqual({
      options: DEFAULT_HARVEST_OPTIONS,
      output: undefined,
    });
  });

  test('ignores invalid values and unknown flags', () => {
    const defaults = { startPage: 1, endPage: 10, delaySeconds: 2, concurrency: 2 };
    const args = parseHarvestArgs(
      ['--start', 'first', '--end=x', '--delay=soon', '--concurrency=0', '--verbose'],
      defaults
    );

    expect(args.options).toEqual(defaults);
  });

  test('skips flags left without a value', () => {
    const defaults = { startPage: 1, endPage: 10, delaySeconds: 2, concurrency: 2 };

    expect(parseHarvestArgs(['--end'], defaults)).toEqual({ options: defaults, output: undefined });
    expect(parseHarvestArgs(['--start', '--end', '5', '--output'], defaults)).toEqual({
      options: { ...defaults, endPage: 5 },
      output: undefined,
    });
  });
});

describe('parseAnalyzeArgs', () => {
  test('takes an explicit CSV path', () => {
    expect(parseAnalyzeArgs(['data/games.csv'])).toEqual({ csvFile: 'data/games.csv' });
  });

  test('leaves the path unset without arguments', () => {
    expect(parseAnalyzeArgs([])).toEqual({ csvFile: undefined });
  });
});
