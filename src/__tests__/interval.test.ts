import { describe, it, expect } from 'vitest';
import {
  createScoredInterval,
  intervalLength,
  intervalMidpoint,
  intervalsOverlap,
  InvalidIntervalError,
  InvalidScoreError,
} from '../services/planning';

describe('createScoredInterval', () => {
  it('builds a frozen interval', () => {
    const iv = createScoredInterval({ start: 5, end: 15, score: 0.4, label: 'Intro' }, 60);
    expect(iv).toEqual({ start: 5, end: 15, score: 0.4, label: 'Intro' });
    expect(Object.isFrozen(iv)).toBe(true);
  });

  it('accepts an interval ending exactly at the video duration', () => {
    expect(createScoredInterval({ start: 50, end: 60, score: 0 }, 60).end).toBe(60);
  });

  it.each([
    { start: 10, end: 10 },
    { start: 12, end: 10 },
    { start: -1, end: 10 },
    { start: 50, end: 61 },
    { start: Number.NaN, end: 10 },
  ])('rejects bounds $start..$end', ({ start, end }) => {
    expect(() => createScoredInterval({ start, end, score: 1 }, 60)).toThrow(InvalidIntervalError);
  });

  it.each([-0.1, Number.POSITIVE_INFINITY, Number.NaN])('rejects score %s', (score) => {
    expect(() => createScoredInterval({ start: 0, end: 10, score }, 60)).toThrow(InvalidScoreError);
  });

  it('reports the error as a validation fault', () => {
    let caught: unknown;
    try {
      createScoredInterval({ start: 0, end: 10, score: -1 }, 60);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidScoreError);
    expect(caught).toMatchObject({ category: 'validation', score: -1 });
  });
});

describe('interval helpers', () => {
  it('computes length and midpoint', () => {
    expect(intervalLength({ start: 10, end: 25 })).toBe(15);
    expect(intervalMidpoint({ start: 10, end: 25 })).toBe(17.5);
  });

  it('treats touching intervals as non-overlapping', () => {
    expect(intervalsOverlap({ start: 0, end: 10 }, { start: 10, end: 20 })).toBe(false);
    expect(intervalsOverlap({ start: 0, end: 10 }, { start: 9, end: 20 })).toBe(true);
  });
});
