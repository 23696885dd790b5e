#!/usr/bin/env node
import { parseCommand, UsageError, USAGE, type Command } from "./lib/command";
import { clipJobSchema, clipQueue, closeQueue } from "./lib/queue";
import { runClipPipeline, toSelectionConfig } from "./services/pipeline";
import { ClipPlanningError, describeFailure } from "./services/planning";

function readCommand(argv: string[]): Command | null {
  try {
    return parseCommand(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error(USAGE);
      return null;
    }
    throw err;
  }
}

async function main(argv: string[]): Promise<number> {
  const command = readCommand(argv);
  if (!command) {
    return 1;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  try {
    // Reject bad options before touching the network.
    toSelectionConfig(command.request);

    if (command.queue) {
      try {
        const job = await clipQueue().add(
          "clip",
          clipJobSchema.parse(command.request),
        );
        console.log(`Job ${job.id} added to queue for ${command.request.videoUrl}`);
      } finally {
        await closeQueue();
      }
      return 0;
    }

    const result = await runClipPipeline(command.request);
    for (const clip of result.clips) {
      const where = clip.url ? `${clip.file} (${clip.url})` : clip.file;
      console.log(
        `#${clip.position + 1} [${clip.start.toFixed(1)}s - ${clip.end.toFixed(1)}s] ${where}`,
      );
    }
    for (const failure of result.failures) {
      console.error(`#${failure.position + 1} failed: ${failure.error}`);
    }
    return result.failures.length > 0 ? 1 : 0;
  } catch (err) {
    console.error(describeFailure(err));
    if (!(err instanceof ClipPlanningError) || err.category === "internal") {
      console.error(err);
    }
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error("Unexpected failure:", err);
    process.exitCode = 1;
  },
);
