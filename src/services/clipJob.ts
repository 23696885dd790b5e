import type { Job } from "bullmq";
import { clipJobSchema, type ClipJob } from "../lib/queue";
import {
  defaultDeps,
  runClipPipeline,
  type ClipPipelineDeps,
  type ClipPipelineResult,
} from "./pipeline";
import { ClipPlanningError, describeFailure } from "./planning";

export async function processClipJob(
  job: Pick<Job<ClipJob>, "id" | "data">,
  deps: ClipPipelineDeps = defaultDeps(),
): Promise<ClipPipelineResult> {
  const request = clipJobSchema.parse(job.data);
  console.log(
    `[Worker] Job ${job.id}: ${request.mode} clips for ${request.videoUrl}`,
  );

  try {
    const result = await runClipPipeline(request, deps);
    const summary = {
      videoId: result.videoId,
      plannedClips: result.plan.windows.length,
      successfulClips: result.clips.length,
      failedClips: result.failures.length,
      failures: result.failures,
    };
    console.log("Processing summary:", JSON.stringify(summary, null, 2));
    return result;
  } catch (error) {
    if (error instanceof ClipPlanningError && error.category !== "internal") {
      console.error(`[Worker] Job ${job.id}: ${describeFailure(error)}`);
    } else {
      console.error(`[Worker] Job ${job.id} crashed:`, error);
    }
    throw error;
  }
}
