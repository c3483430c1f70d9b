import assert from "node:assert/strict";
import test from "node:test";
import type { MessageRecord, RawMessage } from "@list-archive/shared";
import { PgArchiveStore } from "./pg-store.js";
import { RecordingSource } from "./recording-source.js";

const message: RawMessage = {
  mailingList: "quic",
  uidvalidity: 1500,
  uid: 12,
  raw: new TextEncoder().encode("Subject: hi\r\n\r\nbody")
};

const record: MessageRecord = {
  from: { name: "Ana", address: "ana@example.org" },
  to: [
    { name: null, address: "quic@ietf.org" },
    { name: "Bo", address: "bo@example.net" }
  ],
  cc: [{ name: null, address: "cc@example.com" }],
  subject: "hi",
  date: "2020-02-03 04:05:06",
  messageId: "<m1@example.org>",
  inReplyTo: null
};

test("writeFolder replaces the list, inserts the message with recipients in order and commits", async () => {
  const source = new RecordingSource((text) =>
    text.startsWith("INSERT INTO messages (") ? [{ message_num: "7" }] : undefined
  );
  const store = new PgArchiveStore(source);

  const messageNum = await store.writeFolder("quic", async (writer) => {
    const num = await writer.insertMessage(message, record);
    await writer.writeSummary({
      mailingList: "quic",
      messageCount: 1,
      firstDate: "2020-02-03 04:05:06",
      lastDate: "2020-02-03 04:05:06"
    });
    return num;
  });

  assert.equal(messageNum, 7);
  const statements = source.statements();
  assert.equal(statements[0], "BEGIN");
  assert.equal(statements[1], "DELETE FROM messages WHERE mailing_list = $1");
  assert.equal(statements[2], "DELETE FROM lists WHERE name = $1");
  assert.ok(statements[3].startsWith("INSERT INTO messages ("));
  assert.equal(statements[4], "INSERT INTO messages_to (message_num, to_name, to_addr) VALUES ($1, $2, $3)");
  assert.equal(statements[6], "INSERT INTO messages_cc (message_num, cc_name, cc_addr) VALUES ($1, $2, $3)");
  assert.ok(statements[7].startsWith("INSERT INTO lists (name, msg_count, first_date, last_date)"));
  assert.equal(statements[8], "COMMIT");
  assert.equal(statements.length, 9);

  assert.deepEqual(source.queries[3].values.slice(0, 9), [
    "quic",
    1500,
    12,
    "Ana",
    "ana@example.org",
    "hi",
    "2020-02-03 04:05:06",
    "<m1@example.org>",
    null
  ]);
  assert.deepEqual(source.queries[3].values[9], Buffer.from(message.raw));
  assert.deepEqual(source.queries[4].values, [7, null, "quic@ietf.org"]);
  assert.deepEqual(source.queries[5].values, [7, "Bo", "bo@example.net"]);
  assert.deepEqual(source.queries[6].values, [7, null, "cc@example.com"]);
  assert.deepEqual(source.queries[7].values, ["quic", 1, "2020-02-03 04:05:06", "2020-02-03 04:05:06"]);
  assert.equal(source.released, 1);
});

test("a failing statement rolls the folder back and releases the client", async () => {
  const source = new RecordingSource((text) => {
    if (text.startsWith("INSERT INTO messages (")) {
      return [{ message_num: 3 }];
    }
    if (text.startsWith("INSERT INTO messages_cc")) {
      return new Error("connection reset");
    }
    return undefined;
  });
  const store = new PgArchiveStore(source);

  await assert.rejects(
    store.writeFolder("quic", (writer) => writer.insertMessage(message, record)),
    /connection reset/
  );
  const statements = source.statements();
  assert.equal(statements.at(-1), "ROLLBACK");
  assert.equal(statements.includes("COMMIT"), false);
  assert.equal(source.released, 1);
});

test("an insert that returns no message number is an error", async () => {
  const store = new PgArchiveStore(new RecordingSource());
  await assert.rejects(
    store.writeFolder("quic", (writer) => writer.insertMessage(message, record)),
    /Unexpected message_num returned by insert: undefined/
  );
});

test("NUL characters are removed from text columns", async () => {
  const source = new RecordingSource((text) =>
    text.startsWith("INSERT INTO messages (") ? [{ message_num: "2" }] : undefined
  );
  const store = new PgArchiveStore(source);
  await store.writeFolder("quic", (writer) =>
    writer.insertMessage(message, {
      ...record,
      subject: "a\u0000b",
      to: [{ name: "B\u0000o", address: "bo@example.net" }],
      cc: []
    })
  );

  assert.deepEqual(source.queries[3].values.slice(3, 6), ["Ana", "ana@example.org", "ab"]);
  assert.deepEqual(source.queries[4].values, [2, "Bo", "bo@example.net"]);
});
