import { buildMessageRecord } from "@list-archive/mail-headers";
import type { CorrelationId, FolderSummary, NormalizationProfile } from "@list-archive/shared";
import { FolderAggregator } from "./archive/aggregator.js";
import { folderExportPath, readFolderExport } from "./archive/folder-file.js";
import { ArchiveFileError } from "./errors.js";
import { logDiagnostics, toStructuredLogContext, toStructuredLogEvent, type Logger } from "./logging.js";
import type { ArchiveStore } from "./store/types.js";

export type IngestFolderInput = {
  archiveDir: string;
  mailingList: string;
  store: ArchiveStore;
  logger: Logger;
  correlationId?: CorrelationId;
  jobId?: string;
  queueName?: string;
  profile?: NormalizationProfile;
};

/**
 * Loads one folder export and writes all of its messages, then the folder
 * summary, through a single store writer.
 */
export async function ingestFolder(input: IngestFolderInput): Promise<FolderSummary> {
  const startedAt = Date.now();
  const { mailingList, logger } = input;
  const context = toStructuredLogContext({
    mailingList,
    stage: "folder_ingest",
    queueName: input.queueName,
    jobId: input.jobId,
    correlationId: input.correlationId
  });

  const folder = await readFolderExport(input.archiveDir, mailingList);
  if (folder.mailingList !== mailingList) {
    throw new ArchiveFileError({
      path: folderExportPath(input.archiveDir, mailingList),
      reason: `export holds folder "${folder.mailingList}"`
    });
  }

  logger.info(
    toStructuredLogEvent(context, "folder.start", {
      startedAt: new Date(startedAt).toISOString(),
      messageCount: folder.messages.length
    }),
    "folder.start"
  );

  const summary = await input.store.writeFolder(mailingList, async (writer) => {
    const aggregator = new FolderAggregator(mailingList);
    for (const message of folder.messages) {
      const { record, diagnostics } = buildMessageRecord(message.raw, { mailingList, profile: input.profile });
      logDiagnostics(logger, { ...context, uidvalidity: message.uidvalidity, uid: message.uid }, diagnostics);
      await writer.insertMessage(message, record);
      aggregator.add(record);
    }
    const folderSummary = aggregator.summary();
    await writer.writeSummary(folderSummary);
    return folderSummary;
  });

  logger.info(
    toStructuredLogEvent(context, "folder.done", {
      elapsedMs: Date.now() - startedAt,
      messageCount: summary.messageCount
    }),
    "folder.done"
  );
  return summary;
}
