import { intervalLength, intervalMidpoint, intervalsOverlap, type ScoredInterval } from './interval'
import {
  InvalidAlignmentError,
  InvalidConfigError,
  NoClipsProducedError,
  OverlapInvariantViolation,
} from './errors'

export type ClipAlign = 'left' | 'center' | 'right'

export type OutputOrder = 'timeline' | 'rank'

export type SelectionConfig = {
  readonly clipLength?: number
  readonly clipCount?: number
  readonly alignment: ClipAlign
  readonly rankByIntensity: boolean
  readonly order: OutputOrder
}

export type SelectionConfigInput = {
  clipLength?: number
  clipCount?: number
  alignment?: string
  rankByIntensity?: boolean
  order?: OutputOrder
}

export type ClipWindow = {
  readonly start: number
  readonly end: number
  readonly sourceInterval: ScoredInterval
  /** Selection priority, 0 = picked first */
  readonly rank: number
  /** Index in the returned sequence */
  readonly position: number
}

const ALIGNMENTS: readonly ClipAlign[] = ['left', 'center', 'right']
const MIN_CLIP_LENGTH = 1e-9

export function parseAlignment(value: string): ClipAlign {
  const normalized = value.trim().toLowerCase()
  const match = ALIGNMENTS.find(a => a === normalized)
  if (!match) { throw new InvalidAlignmentError(value) }
  return match
}

export function createSelectionConfig(input: SelectionConfigInput = {}): SelectionConfig {
  const { clipLength, clipCount } = input
  if (clipLength !== undefined && (!Number.isFinite(clipLength) || clipLength <= 0)) {
    throw new InvalidConfigError('clipLength', clipLength)
  }
  if (clipCount !== undefined && (!Number.isInteger(clipCount) || clipCount < 1)) {
    throw new InvalidConfigError('clipCount', clipCount)
  }
  const config: SelectionConfig = {
    clipLength,
    clipCount,
    alignment: input.alignment === undefined ? 'center' : parseAlignment(input.alignment),
    rankByIntensity: input.rankByIntensity ?? false,
    order: input.order ?? 'timeline',
  }
  return Object.freeze(config)
}

export function selectClips(intervals: readonly ScoredInterval[], config: SelectionConfig): ClipWindow[] {
  const ordered = config.rankByIntensity ? rankByScore(intervals) : intervals.slice()
  const limit = config.clipCount ?? Infinity
  const chosen: Array<{ start: number; end: number; sourceInterval: ScoredInterval; rank: number }> = []
  for (const interval of ordered) {
    if (chosen.length >= limit) { break }
    const window = alignWindow(interval, config)
    if (!window) { continue }
    chosen.push({ ...window, sourceInterval: interval, rank: chosen.length })
  }
  if (chosen.length === 0) {
    throw new NoClipsProducedError(intervals.length)
  }
  const presented = config.order === 'timeline' ? chosen.slice().sort((a, b) => a.start - b.start) : chosen
  const windows = presented.map((w, position) => Object.freeze({ ...w, position }))
  assertNoOverlap(windows)
  return windows
}

export function rankByScore(intervals: readonly ScoredInterval[]): ScoredInterval[] {
  return intervals.slice().sort((a, b) => b.score - a.score || a.start - b.start)
}

export function alignWindow(interval: ScoredInterval, config: Pick<SelectionConfig, 'clipLength' | 'alignment'>): { start: number; end: number } | null {
  const available = intervalLength(interval)
  const length = Math.min(config.clipLength ?? available, available)
  if (length <= MIN_CLIP_LENGTH) { return null }
  if (length === available) { return { start: interval.start, end: interval.end } }
  switch (config.alignment) {
    case 'left':
      return { start: interval.start, end: Math.min(interval.start + length, interval.end) }
    case 'right':
      return { start: Math.max(interval.end - length, interval.start), end: interval.end }
    case 'center': {
      const mid = intervalMidpoint(interval)
      let start = mid - length / 2
      if (start < interval.start) { start = interval.start }
      if (start + length > interval.end) { start = interval.end - length }
      return { start, end: Math.min(start + length, interval.end) }
    }
  }
}

function assertNoOverlap(windows: readonly ClipWindow[]): void {
  const byStart = windows.slice().sort((a, b) => a.start - b.start)
  for (let i = 1; i < byStart.length; i++) {
    if (intervalsOverlap(byStart[i - 1], byStart[i])) {
      throw new OverlapInvariantViolation(byStart[i - 1], byStart[i], windows)
    }
  }
}
