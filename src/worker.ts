import { Worker } from "bullmq";
import { connection, CLIP_QUEUE_NAME, type ClipJob } from "./lib/queue";
import { cleanupTempFiles } from "./lib/cleanup";
import { processClipJob } from "./services/clipJob";
import type { ClipPipelineResult } from "./services/pipeline";

function initializeWorker() {
  console.log("Initializing worker...");

  const worker = new Worker<ClipJob, ClipPipelineResult>(
    CLIP_QUEUE_NAME,
    (job) => processClipJob(job),
    {
      connection: connection(),
      concurrency: Math.max(1, Number(process.env.WORKER_CONCURRENCY || 1)),
      lockDuration: 1800000,
      lockRenewTime: 30000,
    },
  );

  worker.on("completed", (job) => {
    console.log(`Job ${job.id} completed`);
  });

  worker.on("failed", (job, err) => {
    console.error(`Job ${job?.id} failed:`, err);
  });

  cleanupTempFiles();
  console.log("Worker started and ready to process jobs");
}

initializeWorker();
