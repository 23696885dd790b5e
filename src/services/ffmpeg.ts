import ffmpegInstaller from "@ffmpeg-installer/ffmpeg";
import ffprobeInstaller from "@ffprobe-installer/ffprobe";
import { spawn } from "child_process";
import * as fs from "fs/promises";
import { z } from "zod";

const ffmpegPath = process.env.FFMPEG_PATH || ffmpegInstaller.path;
const ffprobePath = process.env.FFPROBE_PATH || ffprobeInstaller.path;

interface Probe {
  width: number;
  height: number;
  fps: number;
}

function run(
  bin: string,
  args: string[],
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const p = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });
    let out = "";
    let err = "";
    p.stdout.on("data", (d) => (out += d.toString()));
    p.stderr.on("data", (d) => (err += d.toString()));
    p.on("error", reject);
    p.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout: out, stderr: err });
      } else {
        reject(new Error(err || out || `exit ${code}`));
      }
    });
  });
}

const probeSchema = z.object({
  streams: z.array(
    z.object({
      width: z.number(),
      height: z.number(),
      avg_frame_rate: z.string().optional(),
    }),
  ),
});

export async function probeVideo(file: string): Promise<Probe> {
  const args = [
    "-v",
    "error",
    "-select_streams",
    "v:0",
    "-show_entries",
    "stream=width,height,avg_frame_rate",
    "-of",
    "json",
    file,
  ];
  const { stdout } = await run(ffprobePath, args);
  const s = probeSchema.parse(JSON.parse(stdout)).streams[0];
  if (!s) {
    throw new Error(`no video stream in ${file}`);
  }
  const fpsParts = String(s.avg_frame_rate || "0/1").split("/");
  const fps = Number(
    fpsParts[1] === "0" ? 0 : Number(fpsParts[0]) / Number(fpsParts[1]),
  );
  return { width: s.width, height: s.height, fps };
}

export interface BlurredSquareLayout {
  width: number;
  height: number;
  blurSigma: number;
}

export const DEFAULT_LAYOUT: BlurredSquareLayout = {
  width: 1080,
  height: 1920,
  blurSigma: 50,
};

/**
 * Vertical frame: a 9:16 centre crop of the source, scaled and blurred, with a
 * square centre crop of the source overlaid in the middle.
 */
export function buildBlurredSquareFilter(
  layout: BlurredSquareLayout = DEFAULT_LAYOUT,
): string {
  const { width, height, blurSigma } = layout;
  return [
    "[0:v]split[original][copy]",
    `[copy]crop=ih*9/16:ih:iw/2-ow/2:0,scale=${width}:${height},gblur=sigma=${blurSigma}[blurred]`,
    `[original]scale=-2:${width},crop=${width}:${width}:iw/2-ow/2:ih/2-oh/2[scaled]`,
    "[blurred][scaled]overlay=(main_w-overlay_w)/2:(main_h-overlay_h)/2,format=yuv420p[out]",
  ].join(";");
}

export interface RenderClipOptions {
  inputPath: string;
  outputPath: string;
  startTime: number;
  duration: number;
  layout?: BlurredSquareLayout;
}

export function buildRenderArgs(options: RenderClipOptions): string[] {
  const dur = Math.max(0, options.duration);
  return [
    "-y",
    "-ss",
    String(options.startTime),
    "-t",
    String(dur),
    "-i",
    options.inputPath,
    "-filter_complex",
    buildBlurredSquareFilter(options.layout),
    "-map",
    "[out]",
    "-map",
    "0:a?",
    "-c:v",
    "libx264",
    "-preset",
    "ultrafast",
    "-pix_fmt",
    "yuv420p",
    "-c:a",
    "aac",
    "-b:a",
    "192k",
    "-movflags",
    "+faststart",
    options.outputPath,
  ];
}

export async function renderBlurredSquareClip(
  options: RenderClipOptions,
): Promise<void> {
  const p = await probeVideo(options.inputPath);
  console.log(
    `[Render] ${options.outputPath} from ${p.width}x${p.height}@${p.fps.toFixed(2)} ` +
      `[${options.startTime.toFixed(2)}s +${options.duration.toFixed(2)}s]`,
  );
  await run(ffmpegPath, buildRenderArgs(options));
  await fs.stat(options.outputPath);
}
