import { InvalidIntervalError, InvalidScoreError } from './errors'

/**
 * A scored span of the source video: one heatmap sample or one chapter.
 * Times are seconds from the start of the video.
 */
export interface ScoredInterval {
  readonly start: number
  readonly end: number
  /** Relative interest, comparable only within one signal. */
  readonly score: number
  /** Chapter title or heatmap peak id, for traceability only. */
  readonly label?: string
}

export type ScoredIntervalInput = {
  start: number
  end: number
  score: number
  label?: string
}

export function createScoredInterval(input: ScoredIntervalInput, videoDuration: number): ScoredInterval {
  const { start, end, score, label } = input
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || start >= end || end > videoDuration) {
    throw new InvalidIntervalError(start, end, videoDuration)
  }
  if (!Number.isFinite(score) || score < 0) {
    throw new InvalidScoreError(score)
  }
  const interval: ScoredInterval = label === undefined ? { start, end, score } : { start, end, score, label }
  return Object.freeze(interval)
}

export function intervalLength(interval: { start: number; end: number }): number {
  return interval.end - interval.start
}

export function intervalMidpoint(interval: { start: number; end: number }): number {
  return (interval.start + interval.end) / 2
}

// Half-open: touching spans do not overlap.
export function intervalsOverlap(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start < b.end && b.start < a.end
}
