import type { ClipWindow } from './selector'

export type ErrorCategory = 'validation' | 'signal' | 'production' | 'internal'

export class ClipPlanningError extends Error {
  constructor(message: string, public readonly category: ErrorCategory) {
    super(message)
    this.name = 'ClipPlanningError'
  }
}

export class InvalidIntervalError extends ClipPlanningError {
  constructor(
    public readonly start: number,
    public readonly end: number,
    public readonly videoDuration: number
  ) {
    super(`Invalid interval [${start}, ${end}] for video of ${videoDuration}s`, 'validation')
    this.name = 'InvalidIntervalError'
  }
}

export class InvalidScoreError extends ClipPlanningError {
  constructor(public readonly score: number) {
    super(`Invalid score ${score}: must be finite and >= 0`, 'validation')
    this.name = 'InvalidScoreError'
  }
}

export class InvalidAlignmentError extends ClipPlanningError {
  constructor(public readonly alignment: string) {
    super(`Invalid alignment "${alignment}": expected left, center or right`, 'validation')
    this.name = 'InvalidAlignmentError'
  }
}

export class InvalidConfigError extends ClipPlanningError {
  constructor(public readonly field: string, public readonly value: unknown) {
    super(`Invalid ${field}: ${String(value)}`, 'validation')
    this.name = 'InvalidConfigError'
  }
}

export class EmptySignalError extends ClipPlanningError {
  constructor(public readonly signalKind: string) {
    super(`No usable ${signalKind} data for this video`, 'signal')
    this.name = 'EmptySignalError'
  }
}

export class NonCoveringSignalError extends ClipPlanningError {
  constructor(
    public readonly gapStart: number,
    public readonly gapEnd: number,
    public readonly tolerance: number
  ) {
    super(`Signal gap [${gapStart}, ${gapEnd}] exceeds tolerance of ${tolerance}s`, 'signal')
    this.name = 'NonCoveringSignalError'
  }
}

export class DurationMismatchError extends ClipPlanningError {
  constructor(
    public readonly coveredSpan: number,
    public readonly videoDuration: number
  ) {
    super(`Signal covers ${coveredSpan}s but video is ${videoDuration}s long`, 'signal')
    this.name = 'DurationMismatchError'
  }
}

export class NoClipsProducedError extends ClipPlanningError {
  constructor(public readonly intervalCount: number) {
    super(`No clips produced from ${intervalCount} intervals`, 'production')
    this.name = 'NoClipsProducedError'
  }
}

export class OverlapInvariantViolation extends ClipPlanningError {
  constructor(
    public readonly first: ClipWindow,
    public readonly second: ClipWindow,
    public readonly windows: readonly ClipWindow[]
  ) {
    super(
      `Clip windows overlap: [${first.start}, ${first.end}] and [${second.start}, ${second.end}]`,
      'internal'
    )
    this.name = 'OverlapInvariantViolation'
  }
}

export function describeFailure(err: unknown): string {
  if (err instanceof ClipPlanningError) {
    if (err.category === 'signal') { return `cannot plan clips for this video: ${err.message}` }
    if (err.category === 'production') { return `no clips could be made with these options: ${err.message}` }
    if (err.category === 'internal') { return `internal error while planning clips: ${err.message}` }
    return err.message
  }
  if (err instanceof Error) { return err.message }
  return String(err)
}

