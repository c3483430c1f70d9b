import assert from "node:assert/strict";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { ArchiveFileError } from "./errors.js";
import { ingestFolder } from "./ingest.js";
import { createLogger } from "./logging.js";
import { MemoryArchiveStore } from "./store/memory-store.js";
import { PgArchiveStore } from "./store/pg-store.js";
import { RecordingSource } from "./store/recording-source.js";

const logger = createLogger({ level: "silent", name: "ingest-test" });

function encode(lines: string[]): string {
  return Buffer.from(lines.join("\r\n")).toString("base64");
}

async function writeExport(folder: string, body: unknown): Promise<string> {
  const archiveDir = await mkdtemp(path.join(tmpdir(), "list-archive-ingest-"));
  await mkdir(path.join(archiveDir, "lists"));
  await writeFile(path.join(archiveDir, "lists", `${folder}.json`), JSON.stringify(body));
  return archiveDir;
}

test("ingestFolder stores every message and the folder summary", async () => {
  const archiveDir = await writeExport("quic", {
    fetched: "2024-01-01T00:00:00Z",
    folder: "quic",
    uidvalidity: 77,
    msgs: [
      {
        uid: 1,
        msg: encode([
          "From: Ana Example <Ana@Example.org>",
          "To: quic@ietf.org",
          "Subject: first",
          "Date: Tue, 3 Mar 2020 10:00:00 +0100",
          "Message-ID: <one@example.org>",
          "",
          "hello"
        ])
      },
      { uid: 2, msg: encode(["From: bo@example.net", "Subject: second", "In-Reply-To: <one@example.org>", "", ""]) }
    ]
  });
  const store = new MemoryArchiveStore();

  const summary = await ingestFolder({ archiveDir, mailingList: "quic", store, logger });

  assert.deepEqual(summary, {
    mailingList: "quic",
    messageCount: 2,
    firstDate: "2020-03-03 09:00:00",
    lastDate: "2020-03-03 09:00:00"
  });
  assert.deepEqual(store.summary("quic"), summary);

  const [first, second] = store.messages("quic");
  assert.deepEqual(first.record, {
    from: { name: "Ana Example", address: "ana@example.org" },
    to: [{ name: null, address: "quic@ietf.org" }],
    cc: [],
    subject: "first",
    date: "2020-03-03 09:00:00",
    messageId: "<one@example.org>",
    inReplyTo: null
  });
  assert.deepEqual([first.message.uidvalidity, first.message.uid], [77, 1]);
  assert.deepEqual(second.record.from, { name: null, address: "bo@example.net" });
  assert.equal(second.record.inReplyTo, "<one@example.org>");
  assert.equal(second.record.date, null);
  assert.deepEqual(store.recipients("quic", "to"), [
    { id: 1, messageNum: first.messageNum, name: null, address: "quic@ietf.org" }
  ]);
});

test("an export that names another folder is rejected", async () => {
  const archiveDir = await writeExport("quic", { folder: "tls", uidvalidity: 1, msgs: [] });
  await assert.rejects(
    ingestFolder({ archiveDir, mailingList: "quic", store: new MemoryArchiveStore(), logger }),
    (error: unknown) => error instanceof ArchiveFileError && error.message.endsWith(': export holds folder "tls"')
  );
});

test("an empty folder still writes its summary", async () => {
  const archiveDir = await writeExport("empty", { folder: "empty", uidvalidity: 1, msgs: [] });
  const store = new MemoryArchiveStore();
  await ingestFolder({ archiveDir, mailingList: "empty", store, logger });
  assert.deepEqual(store.summaries(), [{ mailingList: "empty", messageCount: 0, firstDate: null, lastDate: null }]);
});

test("a NUL byte in a header does not keep the folder out of the database", async () => {
  const archiveDir = await writeExport("quic", {
    folder: "quic",
    uidvalidity: 3,
    msgs: [{ uid: 9, msg: encode(["From: Ana\u0000 <ana@example.org>", "Subject: hi\u0000there", "", ""]) }]
  });
  const source = new RecordingSource((text, values) => {
    if (values.some((value) => typeof value === "string" && value.includes("\u0000"))) {
      return Object.assign(new Error("invalid byte sequence for encoding \"UTF8\": 0x00"), { code: "22021" });
    }
    return text.startsWith("INSERT INTO messages (") ? [{ message_num: "1" }] : undefined;
  });

  const summary = await ingestFolder({ archiveDir, mailingList: "quic", store: new PgArchiveStore(source), logger });

  assert.equal(summary.messageCount, 1);
  const insert = source.queries.find((query) => query.text.startsWith("INSERT INTO messages ("));
  assert.deepEqual(insert?.values.slice(3, 6), ["Ana", "ana@example.org", "hithere"]);
  assert.equal(source.statements().at(-1), "COMMIT");
});
