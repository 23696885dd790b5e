import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  aggregateChapters,
  aggregateHeatmap,
  aggregateSignal,
  EmptySignalError,
  heatmapPeakScore,
  samplingUnit,
  InvalidScoreError,
  NonCoveringSignalError,
  type HeatmapSample,
} from '../services/planning';

function sample(start: number, end: number, value: number): HeatmapSample {
  return { start, end, value };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('aggregateHeatmap', () => {
  it('passes samples through with their value as score', () => {
    const intervals = aggregateHeatmap([sample(0, 10, 0.2), sample(10, 20, 0.9), sample(20, 30, 0.5)], 30);
    expect(intervals).toEqual([
      { start: 0, end: 10, score: 0.2, label: 'peak-0' },
      { start: 10, end: 20, score: 0.9, label: 'peak-1' },
      { start: 20, end: 30, score: 0.5, label: 'peak-2' },
    ]);
  });

  it('clamps a sample running past the video end', () => {
    const intervals = aggregateHeatmap([sample(0, 10, 0.2), sample(10, 20, 0.9), sample(20, 35, 0.5)], 30);
    expect(intervals[2]).toEqual({ start: 20, end: 30, score: 0.5, label: 'peak-2' });
  });

  it('skips zero-length and out-of-order samples', () => {
    const intervals = aggregateHeatmap([
      sample(0, 10, 0.1),
      sample(10, 10, 0.3),
      sample(10, 20, 0.4),
      sample(5, 8, 0.9),
      sample(20, 30, 0.2),
    ], 30);
    expect(intervals.map(i => i.label)).toEqual(['peak-0', 'peak-2', 'peak-4']);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('moves an overlapping sample to start at the previous end', () => {
    const intervals = aggregateHeatmap([sample(0, 10, 0.1), sample(8, 20, 0.6)], 20);
    expect(intervals).toEqual([
      { start: 0, end: 10, score: 0.1, label: 'peak-0' },
      { start: 10, end: 20, score: 0.6, label: 'peak-1' },
    ]);
  });

  it('drops a sample fully covered by the previous one', () => {
    const intervals = aggregateHeatmap([sample(0, 10, 0.1), sample(5, 10, 0.8), sample(10, 20, 0.3)], 20);
    expect(intervals.map(i => [i.start, i.end])).toEqual([[0, 10], [10, 20]]);
  });

  it('fails on a 2 second gap with a 1 second tolerance', () => {
    const samples = [sample(0, 10, 0.1), sample(12, 22, 0.5), sample(22, 30, 0.3)];
    expect(() => aggregateHeatmap(samples, 30, [], { gapTolerance: 1 })).toThrow(NonCoveringSignalError);
    try {
      aggregateHeatmap(samples, 30, [], { gapTolerance: 1 });
    } catch (err) {
      expect(err).toMatchObject({ gapStart: 10, gapEnd: 12, tolerance: 1, category: 'signal' });
    }
  });

  it('tolerates gaps up to one sampling unit by default', () => {
    const intervals = aggregateHeatmap([sample(0, 5, 0.1), sample(5, 10, 0.2), sample(13, 18, 0.3)], 18);
    expect(intervals).toHaveLength(3);
    expect(() => aggregateHeatmap([sample(0, 5, 0.1), sample(11, 16, 0.2)], 16)).toThrow(NonCoveringSignalError);
  });

  it('measures the sampling unit before clamping the last sample', () => {
    const samples = [sample(0, 10, 0.1), sample(13, 23, 0.5), sample(23, 33, 0.3)];
    const intervals = aggregateHeatmap(samples, 23.2);
    expect(intervals.map(i => [i.start, i.end])).toEqual([[0, 10], [13, 23], [23, 23.2]]);
  });

  it('fails on an empty sample list', () => {
    expect(() => aggregateHeatmap([], 30)).toThrow(EmptySignalError);
  });

  it('fails when every sample is dropped', () => {
    expect(() => aggregateHeatmap([sample(5, 5, 0.5)], 30)).toThrow(EmptySignalError);
  });

  it('rejects a negative engagement value', () => {
    expect(() => aggregateHeatmap([sample(0, 10, -0.2)], 10)).toThrow(InvalidScoreError);
  });

  it('labels samples with the chapter they start in', () => {
    const chapters = [
      { start: 0, end: 15, title: 'Intro' },
      { start: 15, end: 30, title: 'Main' },
    ];
    const intervals = aggregateHeatmap([sample(0, 10, 0.2), sample(10, 20, 0.9), sample(20, 30, 0.5)], 30, chapters);
    expect(intervals.map(i => i.label)).toEqual(['Intro', 'Intro', 'Main']);
  });
});

describe('aggregateChapters', () => {
  const chapters = [
    { start: 0, end: 60, title: 'Intro' },
    { start: 60, end: 180, title: 'Main' },
    { start: 180, end: 200, title: 'Outro' },
  ];

  it('scores chapters by duration', () => {
    expect(aggregateChapters(chapters, 200)).toEqual([
      { start: 0, end: 60, score: 60, label: 'Intro' },
      { start: 60, end: 180, score: 120, label: 'Main' },
      { start: 180, end: 200, score: 20, label: 'Outro' },
    ]);
  });

  it('uses a caller-supplied scoring function', () => {
    const intervals = aggregateChapters(chapters, 200, { scoreChapter: (_chapter, index) => index });
    expect(intervals.map(i => i.score)).toEqual([0, 1, 2]);
  });

  it('fails on a gap between chapters', () => {
    const gappy = [{ start: 0, end: 60, title: 'A' }, { start: 62, end: 100, title: 'B' }];
    expect(() => aggregateChapters(gappy, 100)).toThrow(NonCoveringSignalError);
    expect(aggregateChapters(gappy, 100, { gapTolerance: 2 })).toHaveLength(2);
  });

  it('fails on an empty chapter list', () => {
    expect(() => aggregateChapters([], 100)).toThrow(EmptySignalError);
  });
});

describe('aggregateSignal', () => {
  it('dispatches on the signal kind', () => {
    const fromHeatmap = aggregateSignal({ kind: 'heatmap', duration: 20, samples: [sample(0, 10, 1), sample(10, 20, 0)] });
    expect(fromHeatmap.map(i => i.score)).toEqual([1, 0]);

    const fromChapters = aggregateSignal({
      kind: 'chapters',
      duration: 20,
      chapters: [{ start: 0, end: 5, title: 'A' }, { start: 5, end: 20, title: 'B' }],
    });
    expect(fromChapters.map(i => i.score)).toEqual([5, 15]);
  });
});

describe('samplingUnit', () => {
  it('takes the median raw sample length', () => {
    expect(samplingUnit([sample(0, 10, 0), sample(10, 20, 0), sample(20, 22, 0)])).toBe(10);
    expect(samplingUnit([sample(0, 4, 0), sample(4, 10, 0)])).toBe(5);
  });

  it('ignores empty samples', () => {
    expect(samplingUnit([sample(3, 3, 0), sample(0, 8, 0)])).toBe(8);
    expect(samplingUnit([])).toBe(0);
  });
});

describe('heatmapPeakScore', () => {
  const score = heatmapPeakScore([sample(0, 40, 0.2), sample(40, 80, 0.3), sample(80, 100, 0.9)]);

  it('scores a chapter by its hottest overlapping sample', () => {
    expect(score({ start: 0, end: 80, title: 'Long quiet' })).toBe(0.3);
    expect(score({ start: 80, end: 100, title: 'Short hot' })).toBe(0.9);
  });

  it('scores zero outside the heatmap', () => {
    expect(score({ start: 100, end: 120, title: 'After' })).toBe(0);
  });
});
