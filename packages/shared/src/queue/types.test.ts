import assert from "node:assert/strict";
import test from "node:test";
import { asCorrelationId, resolveCorrelationId } from "../pipeline/ids.js";
import { buildFolderIngestJob, folderIngestJobId } from "./types.js";

test("folderIngestJobId is stable and safe for BullMQ ids", () => {
  assert.equal(folderIngestJobId("ietf"), "folder_ingest-ietf");
  assert.equal(folderIngestJobId("6man:archive/old"), "folder_ingest-6man_archive_old");
});

test("buildFolderIngestJob keeps the correlation id and stamps enqueue time", () => {
  const correlationId = asCorrelationId("3f1c1c8e-4a55-4b43-9d2a-1b2f0f6c9e10");
  const job = buildFolderIngestJob({
    mailingList: "quic",
    correlationId,
    enqueuedAt: "2024-05-01T00:00:00.000Z"
  });
  assert.deepEqual(job, {
    mailingList: "quic",
    correlationId,
    enqueuedAt: "2024-05-01T00:00:00.000Z"
  });
});

test("resolveCorrelationId reuses valid ids and replaces junk", () => {
  const valid = "3f1c1c8e-4a55-4b43-9d2a-1b2f0f6c9e10";
  assert.equal(resolveCorrelationId(` ${valid} `), valid);
  const minted = resolveCorrelationId("not-a-uuid");
  assert.notEqual(minted, "not-a-uuid");
  assert.match(minted, /^[0-9a-f-]{36}$/);
});
