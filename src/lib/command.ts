import { parseArgs } from "util";
import type { ClipRequest } from "../services/pipeline";
import type { SignalKind } from "../services/planning";

export const USAGE = `Usage:
  clip-heatmap  --video-url <url> [options]   clip the most replayed parts of a video
  clip-chapters --video-url <url> [options]   clip a video's chapters

Options:
  --clip-length <seconds>          maximum clip length
  --align <left|center|right>      clip position inside its heatmap sample or chapter
  --clip-count <n>                 maximum number of clips
  --most-intense, --no-most-intense
                                   pick clips by intensity instead of timeline order
  --out-dir <dir>                  where rendered clips are written (default ./clips)
  --queue                          enqueue the job for the worker instead of running it
  -h, --help                       show this help`;

const COMMANDS: Record<string, SignalKind> = {
  "clip-heatmap": "heatmap",
  "clip-chapters": "chapters",
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type Command =
  | { kind: "help" }
  | { kind: "run"; request: ClipRequest; queue: boolean };

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const n = Number(value);
  if (value.trim() === "" || Number.isNaN(n)) {
    throw new UsageError(`--${flag} expects a number, got "${value}"`);
  }
  return n;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        "video-url": { type: "string" },
        "clip-length": { type: "string" },
        align: { type: "string" },
        "clip-count": { type: "string" },
        "most-intense": { type: "boolean" },
        "no-most-intense": { type: "boolean" },
        "out-dir": { type: "string" },
        queue: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCommand(argv: string[]): Command {
  const { values, positionals } = readArgs(argv);

  if (values.help) {
    return { kind: "help" };
  }
  const name = positionals[0];
  if (!name) {
    throw new UsageError("missing command");
  }
  const mode = COMMANDS[name];
  if (!mode) {
    throw new UsageError(`unknown command "${name}"`);
  }
  const videoUrl = values["video-url"];
  if (!videoUrl) {
    throw new UsageError("--video-url is required");
  }
  if (values["most-intense"] && values["no-most-intense"]) {
    throw new UsageError("--most-intense and --no-most-intense are exclusive");
  }

  return {
    kind: "run",
    queue: values.queue ?? false,
    request: {
      videoUrl,
      mode,
      clipLength: toNumber("clip-length", values["clip-length"]),
      clipCount: toNumber("clip-count", values["clip-count"]),
      align: values.align,
      mostIntense: values["most-intense"] ?? false,
      outDir: values["out-dir"],
    },
  };
}
