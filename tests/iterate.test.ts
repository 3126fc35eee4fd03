import {CheckError, collect, iterate} from '../src';
import {oneTwoThree, range} from './generators';


describe('iterating', () => {
  test('spreads all values and disposes afterwards', () => {
    const gen = range.create(0, 3);
    expect([...iterate(gen)]).toEqual([0, 1, 2]);
    expect(gen.status).toBe('disposed');
  });

  test('disposes when the loop stops early', () => {
    const log: string[] = [];
    const gen = oneTwoThree().create(log);
    const seen: number[] = [];
    for (const value of iterate(gen)) {
      seen.push(value);
      break;
    }
    expect(seen).toEqual([1]);
    expect(log).toEqual(['cleanup']);
    expect(gen.stats.resumes).toBe(1);
  });

  test('disposes when the loop throws', () => {
    const log: string[] = [];
    const gen = oneTwoThree().create(log);
    expect(() => {
      for (const value of iterate(gen)) {
        if (value === 2) throw new Error('stop at two');
      }
    }).toThrow('stop at two');
    expect(log).toEqual(['cleanup']);
  });
});


describe('collecting', () => {
  test('collects up to a limit', () => {
    const log: string[] = [];
    const gen = oneTwoThree().create(log);
    expect(collect(gen, 2)).toEqual([1, 2]);
    expect(log).toEqual(['cleanup']);
    expect(gen.stats.resumes).toBe(2);
  });

  test('takes nothing with a zero limit', () => {
    const gen = range.create(0, 3);
    expect(collect(gen, 0)).toEqual([]);
    expect(gen.stats.resumes).toBe(0);
    expect(gen.status).toBe('disposed');
  });

  test('rejects a negative limit', () => {
    expect(() => collect(range.create(0, 3), -1)).toThrow(CheckError);
  });

  test('rejects a limit that is not a number', () => {
    const gen = range.create(0, 3);
    expect(() => collect(gen, NaN)).toThrow('Limit must be non-negative, got NaN');
    expect(gen.stats.resumes).toBe(0);
  });
});
