import { UnrecoverableError } from "bullmq";
import { isPermanentError, serializeError, type SerializedError } from "./errors.js";

/**
 * Runs one job body. Transient failures are rethrown for the queue to retry;
 * permanent ones discard the job and surface as BullMQ's UnrecoverableError.
 */
export async function runWithRetryPolicy<TResult>(input: {
  run: () => Promise<TResult>;
  job: { discard: () => void };
  onPermanentFailure?: (error: SerializedError) => void;
}): Promise<TResult> {
  try {
    return await input.run();
  } catch (error) {
    if (!isPermanentError(error)) {
      throw error;
    }

    input.job.discard();
    const serialized = serializeError(error);
    input.onPermanentFailure?.(serialized);
    throw new UnrecoverableError(serialized.message);
  }
}
