import { Queue, QueueOptions } from "bullmq"
import IORedis, { Redis } from "ioredis"
import { z } from "zod"

export const CLIP_QUEUE_NAME = "clips.process"

export const clipJobSchema = z.object({
  videoUrl: z.string().url(),
  mode: z.enum(["heatmap", "chapters"]),
  clipLength: z.number().positive().optional(),
  clipCount: z.number().int().min(1).optional(),
  align: z.string().optional(),
  mostIntense: z.boolean().optional(),
  outDir: z.string().optional()
})

export type ClipJob = z.infer<typeof clipJobSchema>

let redisInstance: Redis | null = null
let clipQueueInstance: Queue<ClipJob> | null = null

export function connection() {
  if (!redisInstance) {
    const url = process.env.REDIS_URL || "redis://localhost:6379"

    redisInstance = new IORedis(url, {
      maxRetriesPerRequest: null
    })
  }

  return redisInstance
}

export function clipQueue() {
  if (!clipQueueInstance) {
    const queueOptions: QueueOptions = {
      connection: connection()
    }

    clipQueueInstance = new Queue<ClipJob>(CLIP_QUEUE_NAME, queueOptions)
  }

  return clipQueueInstance
}

export async function closeQueue(): Promise<void> {
  if (clipQueueInstance) {
    await clipQueueInstance.close()
    clipQueueInstance = null
  }
  if (redisInstance) {
    await redisInstance.quit()
    redisInstance = null
  }
}
