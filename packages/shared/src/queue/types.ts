import type { CorrelationId } from "../pipeline/types.js";

export const QUEUE_NAMES = {
  folderIngest: "folder_ingest"
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export const FOLDER_INGEST_JOB = "folder.ingest";

export type FolderIngestJob = {
  mailingList: string;
  correlationId: CorrelationId;
  enqueuedAt: string;
};

/**
 * One live job per folder: re-enqueueing a folder that is still waiting or
 * active reuses the existing job.
 */
export function folderIngestJobId(mailingList: string): string {
  return `folder_ingest-${mailingList.replace(/[^A-Za-z0-9._-]/g, "_")}`;
}

export function buildFolderIngestJob(input: {
  mailingList: string;
  correlationId: CorrelationId;
  enqueuedAt?: string;
}): FolderIngestJob {
  return {
    mailingList: input.mailingList,
    correlationId: input.correlationId,
    enqueuedAt: input.enqueuedAt ?? new Date().toISOString()
  };
}
