import { Worker } from "bullmq";
import type { Redis } from "ioredis";
import { z } from "zod";
import {
  DEFAULT_JOB_ATTEMPTS,
  ErrorClass,
  QUEUE_NAMES,
  classifyError,
  computeBackoffMs,
  resolveCorrelationId,
  type FolderIngestJob,
  type FolderSummary
} from "@list-archive/shared";
import { ingestFolder } from "./ingest.js";
import { toLogError, toStructuredLogContext, toStructuredLogEvent, type Logger } from "./logging.js";
import { isPermanentError } from "./pipeline/errors.js";
import { runWithRetryPolicy } from "./pipeline/execution.js";
import type { ArchiveStore } from "./store/types.js";

const MAX_LOGGED_STACK_LINES = 6;

const folderJobSchema = z.object({
  mailingList: z.string().trim().min(1),
  correlationId: z.unknown().optional()
});

/** The part of a BullMQ job the processor reads. */
export type FolderJobHandle = {
  id?: string;
  queueName: string;
  data: unknown;
  attemptsMade: number;
  opts: { attempts?: number };
  discard(): void;
};

export type FolderJobDeps = {
  archiveDir: string;
  store: ArchiveStore;
  logger: Logger;
};

function toSafeStack(stack: string | undefined): string | undefined {
  return stack?.split("\n").slice(0, MAX_LOGGED_STACK_LINES).join("\n");
}

/**
 * Processes one folder job: transient failures are rethrown for BullMQ to
 * retry with backoff; permanent ones fail the job without further attempts.
 */
export async function processFolderJob(job: FolderJobHandle, deps: FolderJobDeps): Promise<FolderSummary> {
  const startedAt = Date.now();
  const startedAtIso = new Date(startedAt).toISOString();
  const correlationId = resolveCorrelationId(
    typeof job.data === "object" && job.data !== null && "correlationId" in job.data ? job.data.correlationId : undefined
  );
  const attempt = job.attemptsMade + 1;
  const maxAttempts = job.opts.attempts ?? DEFAULT_JOB_ATTEMPTS;
  let baseLogContext = toStructuredLogContext({
    stage: "folder_ingest",
    queueName: job.queueName,
    jobId: job.id,
    correlationId
  });

  try {
    const summary = await runWithRetryPolicy({
      job,
      run: async () => {
        const data = folderJobSchema.parse(job.data);
        baseLogContext = { ...baseLogContext, mailingList: data.mailingList };
        deps.logger.info(
          toStructuredLogEvent(baseLogContext, "job.start", { startedAt: startedAtIso, attempt, maxAttempts }),
          "job.start"
        );
        return ingestFolder({
          archiveDir: deps.archiveDir,
          mailingList: data.mailingList,
          store: deps.store,
          logger: deps.logger,
          correlationId,
          jobId: job.id,
          queueName: job.queueName
        });
      },
      onPermanentFailure: (error) => {
        deps.logger.warn(
          toStructuredLogEvent(baseLogContext, "job.discarded", { attempt, maxAttempts, errorMessage: error.message }),
          "job.discarded"
        );
      }
    });

    deps.logger.info(
      toStructuredLogEvent(baseLogContext, "job.done", {
        elapsedMs: Date.now() - startedAt,
        attempt,
        maxAttempts,
        messageCount: summary.messageCount
      }),
      "job.done"
    );
    return summary;
  } catch (error) {
    const structuredError = toLogError(error);
    const classifiedError = classifyError(error);
    const errorClass = isPermanentError(error) ? ErrorClass.PERMANENT : classifiedError.class;
    deps.logger.error(
      toStructuredLogEvent(baseLogContext, "job.error", {
        startedAt: startedAtIso,
        elapsedMs: Date.now() - startedAt,
        attempt,
        maxAttempts,
        errorClass,
        errorCode: structuredError.code ?? classifiedError.code,
        errorMessage: structuredError.message,
        errorStack: toSafeStack(structuredError.stack)
      }),
      "job.error"
    );
    throw error;
  }
}

export function startFolderWorker(input: {
  connection: Redis;
  concurrency: number;
  workerName: string;
  deps: FolderJobDeps;
}): Worker<FolderIngestJob, FolderSummary> {
  const { logger } = input.deps;
  const worker = new Worker<FolderIngestJob, FolderSummary>(
    QUEUE_NAMES.folderIngest,
    (job) => processFolderJob(job, input.deps),
    {
      connection: input.connection,
      concurrency: input.concurrency,
      name: input.workerName,
      settings: {
        backoffStrategy: (attemptsMade: number) => computeBackoffMs(attemptsMade)
      }
    }
  );

  let readyLogPrinted = false;
  worker.on("ready", () => {
    if (readyLogPrinted) {
      return;
    }
    readyLogPrinted = true;
    logger.info({ workerName: input.workerName, concurrency: input.concurrency }, "worker.ready");
  });
  worker.on("error", (error) => {
    logger.error({ event: "worker.error", ...toLogError(error) }, "worker.error");
  });

  return worker;
}
