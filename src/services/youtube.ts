import { spawn } from "child_process";
import { promisify } from "util";
import { exec } from "child_process";
import { existsSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type {
  ChapterMarker,
  HeatmapSample,
  SignalKind,
  VideoSignal,
} from "./planning";

const execPromise = promisify(exec);

function run(
  cmd: string,
  args: string[]
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const p = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    let out = "";
    let err = "";
    p.stdout.on("data", (d) => (out += d.toString()));
    p.stderr.on("data", (d) => (err += d.toString()));
    p.on("error", reject);
    p.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout: out, stderr: err });
      } else {
        reject(new Error(err || `exit ${code}`));
      }
    });
  });
}

async function findYtDlp(): Promise<string> {
  if (process.env.YT_DLP_PATH && existsSync(process.env.YT_DLP_PATH)) {
    return process.env.YT_DLP_PATH;
  }

  try {
    await execPromise("which yt-dlp");
    return "yt-dlp";
  } catch {
    try {
      await execPromise("which youtube-dl");
      return "youtube-dl";
    } catch {
      throw new Error("yt-dlp or youtube-dl not found in PATH");
    }
  }
}

function cookieArgs(): string[] {
  const cookieFile = process.env.YT_COOKIES_FILE;
  if (cookieFile && existsSync(cookieFile)) {
    return ["--cookies", cookieFile];
  }
  return [];
}

const chapterSchema = z.object({
  title: z.string().default(""),
  start_time: z.number(),
  end_time: z.number(),
});

const heatmapSchema = z.object({
  start_time: z.number(),
  end_time: z.number(),
  value: z.number(),
});

const metadataSchema = z.object({
  id: z.string().default(""),
  title: z.string().default("Unknown"),
  duration: z.number().nullish(),
  chapters: z.array(chapterSchema).nullish(),
  heatmap: z.array(heatmapSchema).nullish(),
});

export interface VideoMetadata {
  id: string;
  title: string;
  duration: number;
  chapters: ChapterMarker[];
  heatmap: HeatmapSample[];
}

export function parseVideoMetadata(json: unknown): VideoMetadata {
  const meta = metadataSchema.parse(json);
  return {
    id: meta.id,
    title: meta.title,
    duration: meta.duration ?? 0,
    chapters: (meta.chapters ?? []).map((ch) => ({
      title: ch.title,
      start: ch.start_time,
      end: ch.end_time,
    })),
    heatmap: (meta.heatmap ?? []).map((h) => ({
      start: h.start_time,
      end: h.end_time,
      value: h.value,
    })),
  };
}

export function toVideoSignal(
  metadata: VideoMetadata,
  kind: SignalKind
): VideoSignal {
  if (kind === "heatmap") {
    return {
      kind,
      duration: metadata.duration,
      samples: metadata.heatmap,
      chapters: metadata.chapters,
    };
  }
  return {
    kind,
    duration: metadata.duration,
    chapters: metadata.chapters,
    samples: metadata.heatmap,
  };
}

export async function getVideoMetadata(url: string): Promise<VideoMetadata> {
  const ytdlp = await findYtDlp();
  const args = [...cookieArgs(), "--dump-json", "--no-playlist", url];
  const { stdout } = await run(ytdlp, args);
  const metadata = parseVideoMetadata(JSON.parse(stdout));
  console.log(
    `[YouTube] ${metadata.id} "${metadata.title}": ${metadata.duration}s, ` +
      `${metadata.chapters.length} chapters, ${metadata.heatmap.length} heatmap samples`
  );
  return metadata;
}

export async function getVideoSignal(
  url: string,
  kind: SignalKind
): Promise<{ id: string; title: string; signal: VideoSignal }> {
  const metadata = await getVideoMetadata(url);
  return {
    id: metadata.id,
    title: metadata.title,
    signal: toVideoSignal(metadata, kind),
  };
}

const downloadResultSchema = z.object({
  _filename: z.string(),
  height: z.number().nullish(),
  vcodec: z.string().nullish(),
});

export async function downloadVideo(
  url: string,
  workDir: string
): Promise<string> {
  const ytdlp = await findYtDlp();
  const args = [
    ...cookieArgs(),
    "-j",
    "--no-simulate",
    "--no-playlist",
    "-f",
    "bv*[height<=1080][ext=mp4]+ba[ext=m4a]/bv*[height<=1080]+ba/b",
    "--merge-output-format",
    "mp4",
    "-o",
    join(workDir, "%(id)s.%(ext)s"),
    url,
  ];
  console.log("yt-dlp command:", ytdlp, args.join(" "));
  const { stdout, stderr } = await run(ytdlp, args);
  if (stderr && stderr.length > 0) {
    console.log("yt-dlp stderr:", stderr.substring(0, 2000));
  }
  const lines = stdout.trim().split("\n");
  const last = downloadResultSchema.parse(JSON.parse(lines[lines.length - 1]));
  if (last._filename.length === 0) {
    throw new Error("no file downloaded");
  }
  console.log(
    `Downloaded: ${last.height ?? 0}p ${last.vcodec ?? "unknown"} -> ${last._filename}`
  );
  return last._filename;
}
