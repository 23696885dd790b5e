import { createScoredInterval, intervalLength, intervalsOverlap, type ScoredInterval } from './interval'
import { EmptySignalError, NonCoveringSignalError } from './errors'

export type HeatmapSample = {
  start: number
  end: number
  /** Normalised engagement, usually 0..1 */
  value: number
}

export type ChapterMarker = {
  start: number
  end: number
  title: string
}

export type VideoSignal =
  | { kind: 'heatmap'; duration: number; samples: HeatmapSample[]; chapters?: ChapterMarker[] }
  | { kind: 'chapters'; duration: number; chapters: ChapterMarker[]; samples?: HeatmapSample[] }

export type SignalKind = VideoSignal['kind']

export type AggregateOptions = {
  /** Largest gap (seconds) allowed between consecutive intervals. */
  gapTolerance?: number
  scoreChapter?: (chapter: ChapterMarker, index: number) => number
}

const DEFAULT_CHAPTER_GAP_TOLERANCE = 1
const EPSILON = 1e-9

type Span = { start: number; end: number; index: number }

export function aggregateSignal(signal: VideoSignal, options: AggregateOptions = {}): ScoredInterval[] {
  switch (signal.kind) {
    case 'heatmap':
      return aggregateHeatmap(signal.samples, signal.duration, signal.chapters ?? [], options)
    case 'chapters':
      return aggregateChapters(signal.chapters, signal.duration, options)
  }
}

export function aggregateHeatmap(
  samples: HeatmapSample[],
  duration: number,
  chapters: ChapterMarker[] = [],
  options: AggregateOptions = {}
): ScoredInterval[] {
  if (samples.length === 0) {
    throw new EmptySignalError('heatmap')
  }
  const spans = reconcile(samples, duration, 'heatmap')
  if (spans.length === 0) {
    throw new EmptySignalError('heatmap')
  }
  assertContiguous(spans, options.gapTolerance ?? samplingUnit(samples))
  return spans.map(span => createScoredInterval({
    start: span.start,
    end: span.end,
    score: samples[span.index].value,
    label: chapterTitleAt(chapters, span.start) ?? `peak-${span.index}`,
  }, duration))
}

export function aggregateChapters(
  chapters: ChapterMarker[],
  duration: number,
  options: AggregateOptions = {}
): ScoredInterval[] {
  if (chapters.length === 0) {
    throw new EmptySignalError('chapters')
  }
  const spans = reconcile(chapters, duration, 'chapter')
  if (spans.length === 0) {
    throw new EmptySignalError('chapters')
  }
  assertContiguous(spans, options.gapTolerance ?? DEFAULT_CHAPTER_GAP_TOLERANCE)
  const scoreChapter = options.scoreChapter
  return spans.map(span => {
    const chapter = chapters[span.index]
    return createScoredInterval({
      start: span.start,
      end: span.end,
      score: scoreChapter ? scoreChapter(chapter, span.index) : intervalLength(span),
      label: chapter.title,
    }, duration)
  })
}

/**
 * Median length of the raw samples, before clamping or overlap shifts, so one
 * truncated sample does not shrink the unit.
 */
export function samplingUnit(samples: HeatmapSample[]): number {
  const lengths = samples
    .map(intervalLength)
    .filter(len => Number.isFinite(len) && len > EPSILON)
    .sort((a, b) => a - b)
  if (lengths.length === 0) { return 0 }
  const mid = Math.floor(lengths.length / 2)
  return lengths.length % 2 === 1 ? lengths[mid] : (lengths[mid - 1] + lengths[mid]) / 2
}

/** Chapter score from the hottest heatmap sample overlapping it, 0 when none does. */
export function heatmapPeakScore(samples: HeatmapSample[]): (chapter: ChapterMarker) => number {
  return chapter => samples.reduce(
    (peak, sample) => intervalsOverlap(sample, chapter) ? Math.max(peak, sample.value) : peak,
    0
  )
}

// Clamp to the video, drop empty or out-of-order entries, and move the start
// of an overlapping entry to the end of the previous one.
function reconcile(entries: Array<{ start: number; end: number }>, duration: number, what: string): Span[] {
  const kept: Span[] = []
  entries.forEach((entry, index) => {
    const end = Math.min(entry.end, duration)
    let start = entry.start
    if (!Number.isFinite(start) || !Number.isFinite(end) || end - start <= EPSILON) {
      console.warn(`[Aggregator] Skipping zero-length ${what} #${index} at ${entry.start}s`)
      return
    }
    const prev = kept[kept.length - 1]
    if (prev && start < prev.start) {
      console.warn(`[Aggregator] Skipping out-of-order ${what} #${index} at ${start}s`)
      return
    }
    if (prev && start < prev.end) {
      start = prev.end
      if (end - start <= EPSILON) {
        console.warn(`[Aggregator] Skipping ${what} #${index}: covered by previous entry`)
        return
      }
    }
    kept.push({ start, end, index })
  })
  return kept
}

function assertContiguous(spans: Span[], tolerance: number): void {
  for (let i = 1; i < spans.length; i++) {
    const gap = spans[i].start - spans[i - 1].end
    if (gap > tolerance + EPSILON) {
      throw new NonCoveringSignalError(spans[i - 1].end, spans[i].start, tolerance)
    }
  }
}

function chapterTitleAt(chapters: ChapterMarker[], time: number): string | undefined {
  let match: ChapterMarker | undefined
  for (const chapter of chapters) {
    if (time >= chapter.start) { match = chapter }
  }
  return match?.title
}
