/**
 * Unit tests for statistics aggregation
 */

import type { GameRecord } from '@mustplay/shared-types';
import { computeStats, topYears } from '../../src/services/stats/aggregator';
import { alpha, beta, utc } from '../data/catalogData';

const dated = (title: string, year: number, metascore?: number, month = 6, day = 1): GameRecord => ({
  title,
  releaseDate: utc(year, month, day),
  metascore,
});

describe('computeStats', () => {
  test('summarises a small collection', () => {
    const stats = computeStats([alpha, beta]);

    expect(stats.total).toBe(2);
    expect(stats.byDecade).toEqual([
      { key: 1990, count: 1 },
      { key: 2020, count: 1 },
    ]);
    expect(stats.scoreDistribution).toEqual([
      { key: 90, count: 1 },
      { key: 95, count: 1 },
    ]);
    expect(stats.oldest).toBe(beta);
    expect(stats.newest).toBe(alpha);
    expect(stats.recent).toEqual([alpha]);
  });

  test('counts undated records only in the total and the score distribution', () => {
    const undated: GameRecord = { title: 'Drifting Signal', metascore: 90 };
    const stats = computeStats([undated, alpha]);

    expect(stats.total).toBe(2);
    expect(stats.scoreDistribution).toEqual([{ key: 90, count: 2 }]);
    expect(stats.byDecade).toEqual([{ key: 2020, count: 1 }]);
    expect(stats.topYears).toEqual([{ key: 2020, count: 1 }]);
    expect(stats.oldest).toBe(alpha);
    expect(stats.newest).toBe(alpha);
    expect(stats.recent).toEqual([alpha]);
  });

  test('skips records without a score in the distribution', () => {
    const stats = computeStats([dated('No Score', 2005), dated('Scored', 2006, 92), dated('Also 92', 2007, 92)]);
    expect(stats.scoreDistribution).toEqual([{ key: 92, count: 2 }]);
  });

  test('orders decades and scores ascending', () => {
    const stats = computeStats([dated('a', 2015, 97), dated('b', 1985, 91), dated('c', 2001, 94), dated('d', 1989, 91)]);

    expect(stats.byDecade.map((e) => e.key)).toEqual([1980, 2000, 2010]);
    expect(stats.byDecade.map((e) => e.count)).toEqual([2, 1, 1]);
    expect(stats.scoreDistribution).toEqual([
      { key: 91, count: 2 },
      { key: 94, count: 1 },
      { key: 97, count: 1 },
    ]);
  });

  test('keeps first-seen year order between equal counts in the top years', () => {
    const years = [2015, 2001, 2015, 2001, 1998, 2010, 2012, 2019];
    const stats = computeStats(years.map((year, i) => dated(`g${i}`, year)));

    expect(stats.topYears).toEqual([
      { key: 2015, count: 2 },
      { key: 2001, count: 2 },
      { key: 1998, count: 1 },
      { key: 2010, count: 1 },
      { key: 2012, count: 1 },
    ]);
  });

  test('puts higher counts first regardless of when the year was seen', () => {
    const years = [2003, 2011, 2011, 2011, 2003, 1996];
    const stats = computeStats(years.map((year, i) => dated(`g${i}`, year)));

    expect(stats.topYears).toEqual([
      { key: 2011, count: 3 },
      { key: 2003, count: 2 },
      { key: 1996, count: 1 },
    ]);
  });

  test('picks the first record among equal oldest or newest dates', () => {
    const first = dated('First', 1991, 90, 2, 2);
    const second = dated('Second', 1991, 95, 2, 2);
    const stats = computeStats([first, second]);

    expect(stats.oldest).toBe(first);
    expect(stats.newest).toBe(first);
  });

  test('collects records from 2020 on in input order', () => {
    const late = dated('Late', 2024, 88);
    const early = dated('Early', 2020, 93, 1, 1);
    const old = dated('Old', 2019, 99, 12, 31);
    expect(computeStats([late, old, early]).recent).toEqual([late, early]);
  });

  test('handles an empty collection', () => {
    expect(computeStats([])).toEqual({
      total: 0,
      byDecade: [],
      topYears: [],
      scoreDistribution: [],
      oldest: undefined,
      newest: undefined,
      recent: [],
    });
  });
});

describe('topYears', () => {
  test('honours a custom limit', () => {
    const byYear = new Map([
      [2000, 1],
      [2001, 4],
      [2002, 4],
    ]);
    expect(topYears(byYear, 2)).toEqual([
      { key: 2001, count: 4 },
      { key: 2002, count: 4 },
    ]);
  });
});
