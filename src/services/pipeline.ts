import { mkdirSync, mkdtempSync, existsSync, rmSync } from "fs";
import { join, resolve } from "path";
import { tmpdir } from "os";
import {
  createSelectionConfig,
  heatmapPeakScore,
  planClips,
  type ClipPlan,
  type PlanOptions,
  type ClipWindow,
  type SelectionConfig,
  type SignalKind,
  type VideoSignal,
} from "./planning";
import { getVideoSignal, downloadVideo } from "./youtube";
import { renderBlurredSquareClip, type RenderClipOptions } from "./ffmpeg";
import { isUploadEnabled, uploadFile } from "./s3";
import { clipFileName } from "../lib/filename";

export interface ClipRequest {
  videoUrl: string;
  mode: SignalKind;
  clipLength?: number;
  clipCount?: number;
  align?: string;
  mostIntense?: boolean;
  outDir?: string;
}

export interface ClipPipelineDeps {
  getVideoSignal(
    url: string,
    kind: SignalKind,
  ): Promise<{ id: string; title: string; signal: VideoSignal }>;
  downloadVideo(url: string, workDir: string): Promise<string>;
  renderClip(options: RenderClipOptions): Promise<void>;
  /** Returns the public URL; omitted when clips stay local. */
  uploadClip?: (key: string, filePath: string) => Promise<string>;
  renderConcurrency?: number;
}

export interface RenderedClip {
  position: number;
  rank: number;
  start: number;
  end: number;
  label?: string;
  file: string;
  url?: string;
}

export interface ClipFailure {
  position: number;
  error: string;
}

export interface ClipPipelineResult {
  videoId: string;
  title: string;
  plan: ClipPlan;
  clips: RenderedClip[];
  failures: ClipFailure[];
}

export function defaultDeps(): ClipPipelineDeps {
  return {
    getVideoSignal,
    downloadVideo,
    renderClip: renderBlurredSquareClip,
    uploadClip: isUploadEnabled()
      ? (key, filePath) => uploadFile(key, filePath, "video/mp4")
      : undefined,
    renderConcurrency: Math.max(1, Number(process.env.RENDER_CONCURRENCY || 1)),
  };
}

export function toSelectionConfig(request: ClipRequest): SelectionConfig {
  return createSelectionConfig({
    clipLength: request.clipLength,
    clipCount: request.clipCount,
    alignment: request.align,
    rankByIntensity: request.mostIntense ?? false,
  });
}

// Chapters rank by their heatmap peak when the video has a heatmap, else by duration.
export function planOptionsFor(signal: VideoSignal): PlanOptions {
  if (signal.kind === "chapters" && signal.samples && signal.samples.length > 0) {
    return { scoreChapter: heatmapPeakScore(signal.samples) };
  }
  return {};
}

export async function runClipPipeline(
  request: ClipRequest,
  deps: ClipPipelineDeps = defaultDeps(),
): Promise<ClipPipelineResult> {
  const config = toSelectionConfig(request);
  const { id, title, signal } = await deps.getVideoSignal(
    request.videoUrl,
    request.mode,
  );
  const plan = planClips(signal, config, planOptionsFor(signal));

  const outDir = resolve(
    request.outDir || process.env.CLIPS_OUT_DIR || "clips",
    id || "video",
  );
  mkdirSync(outDir, { recursive: true });
  const workDir = mkdtempSync(join(tmpdir(), "clips-"));

  const clips: RenderedClip[] = [];
  const failures: ClipFailure[] = [];

  try {
    const sourcePath = await deps.downloadVideo(request.videoUrl, workDir);

    const renderOne = async (window: ClipWindow) => {
      const label = window.sourceInterval.label;
      const fileName = clipFileName(window.position, label);
      const file = join(outDir, fileName);
      try {
        await deps.renderClip({
          inputPath: sourcePath,
          outputPath: file,
          startTime: window.start,
          duration: window.end - window.start,
        });
        const url = deps.uploadClip
          ? await deps.uploadClip(`clips/${id}/${fileName}`, file)
          : undefined;
        clips.push({
          position: window.position,
          rank: window.rank,
          start: window.start,
          end: window.end,
          label,
          file,
          url,
        });
      } catch (err) {
        console.error(`[Render] Clip ${window.position + 1} failed:`, err);
        failures.push({
          position: window.position,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    };

    const queue = plan.windows.slice();
    const lanes = Math.min(
      Math.max(1, deps.renderConcurrency ?? 1),
      queue.length,
    );
    await Promise.all(
      Array.from({ length: lanes }, async () => {
        for (let next = queue.shift(); next; next = queue.shift()) {
          await renderOne(next);
        }
      }),
    );
  } finally {
    if (existsSync(workDir)) {
      rmSync(workDir, { recursive: true, force: true });
    }
  }

  clips.sort((a, b) => a.position - b.position);
  failures.sort((a, b) => a.position - b.position);
  console.log(
    `Video ${id} processing completed with ${clips.length} successful clips and ${failures.length} failures`,
  );
  return { videoId: id, title, plan, clips, failures };
}
