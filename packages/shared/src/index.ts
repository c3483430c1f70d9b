export type {
  AddressPair,
  DiagnosticCode,
  FolderSummary,
  Identity,
  MessageRecord,
  NormalizationDiagnostic,
  NormalizationProfile,
  RawMessage,
  RawMessageKey
} from "./archive/types.js";

export {
  DATE_SENTINEL_FIRST,
  DATE_SENTINEL_LAST,
  DEFAULT_NORMALIZATION_PROFILE
} from "./archive/types.js";

export type { CorrelationId } from "./pipeline/types.js";

export { asCorrelationId, newCorrelationId, resolveCorrelationId } from "./pipeline/ids.js";

export {
  FOLDER_INGEST_JOB,
  QUEUE_NAMES,
  buildFolderIngestJob,
  folderIngestJobId
} from "./queue/types.js";

export type { FolderIngestJob, QueueName } from "./queue/types.js";

export {
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_CAP_MS,
  DEFAULT_BULLMQ_JOB_OPTIONS,
  DEFAULT_JOB_ATTEMPTS,
  JITTERED_BACKOFF,
  computeBackoffMs
} from "./reliability/retry-policy.js";

export { ErrorClass, classifyError } from "./reliability/error-taxonomy.js";
export type { ClassifiedError } from "./reliability/error-taxonomy.js";
