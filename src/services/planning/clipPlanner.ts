import { aggregateSignal, type AggregateOptions, type SignalKind, type VideoSignal } from './aggregator'
import { DurationMismatchError } from './errors'
import { selectClips, type ClipWindow, type SelectionConfig } from './selector'

export type ClipPlan = {
  videoDuration: number
  signalKind: SignalKind
  windows: ClipWindow[]
}

export type PlanOptions = AggregateOptions & {
  /** Allowed difference (seconds) between the covered span and the video duration. */
  durationTolerance?: number
}

const DEFAULT_DURATION_TOLERANCE = 1

export function planClips(signal: VideoSignal, config: SelectionConfig, options: PlanOptions = {}): ClipPlan {
  const intervals = aggregateSignal(signal, options)
  const first = intervals[0]
  const last = intervals[intervals.length - 1]
  const coveredSpan = last.end - first.start
  const tolerance = options.durationTolerance ?? DEFAULT_DURATION_TOLERANCE
  if (Math.abs(coveredSpan - signal.duration) > tolerance) {
    throw new DurationMismatchError(coveredSpan, signal.duration)
  }
  const windows = selectClips(intervals, config)
  console.log(
    `[Planner] ${windows.length} clips from ${intervals.length} ${signal.kind} intervals ` +
    `(align=${config.alignment}, mostIntense=${config.rankByIntensity})`
  )
  return { videoDuration: signal.duration, signalKind: signal.kind, windows }
}
