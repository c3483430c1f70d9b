import { Queue } from "bullmq";
import { Redis } from "ioredis";
import {
  DEFAULT_BULLMQ_JOB_OPTIONS,
  FOLDER_INGEST_JOB,
  QUEUE_NAMES,
  buildFolderIngestJob,
  folderIngestJobId,
  newCorrelationId,
  type CorrelationId,
  type FolderIngestJob
} from "@list-archive/shared";

const LIVE_JOB_STATES = new Set(["active", "waiting", "delayed", "prioritized", "waiting-children"]);

/** The part of a BullMQ queue the enqueue path relies on. */
export interface FolderQueueClient {
  getJob(jobId: string): Promise<{ id?: string; getState(): Promise<string> } | undefined>;
  remove(jobId: string): Promise<number>;
  add(name: string, data: FolderIngestJob, opts: { jobId: string }): Promise<{ id?: string }>;
}

export type EnqueueResult = {
  mailingList: string;
  jobId: string | undefined;
  reused: boolean;
};

export function createRedisConnection(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false
  });
}

export function createFolderQueue(connection: Redis): Queue<FolderIngestJob> {
  return new Queue<FolderIngestJob>(QUEUE_NAMES.folderIngest, {
    connection,
    defaultJobOptions: DEFAULT_BULLMQ_JOB_OPTIONS
  });
}

/**
 * Queues one folder. A folder whose job is still live keeps that job; a
 * finished or failed one is replaced.
 */
export async function enqueueFolderIngest(
  queue: FolderQueueClient,
  mailingList: string,
  correlationId: CorrelationId = newCorrelationId()
): Promise<EnqueueResult> {
  const jobId = folderIngestJobId(mailingList);

  const existingJob = await queue.getJob(jobId);
  if (existingJob) {
    const state = await existingJob.getState();
    if (LIVE_JOB_STATES.has(state)) {
      return { mailingList, jobId: existingJob.id, reused: true };
    }
    // A job that is locked by a worker cannot be removed; it counts as live.
    const removed = await queue.remove(jobId);
    if (removed === 0) {
      return { mailingList, jobId: existingJob.id, reused: true };
    }
  }

  try {
    const queuedJob = await queue.add(FOLDER_INGEST_JOB, buildFolderIngestJob({ mailingList, correlationId }), {
      jobId
    });
    return { mailingList, jobId: queuedJob.id, reused: false };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (/job\s+.*already\s+exists/i.test(message)) {
      const existing = await queue.getJob(jobId);
      return { mailingList, jobId: existing?.id ?? jobId, reused: true };
    }
    throw error;
  }
}
