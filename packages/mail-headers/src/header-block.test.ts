import assert from "node:assert/strict";
import test from "node:test";
import { readHeaderBlock } from "./header-block.js";

test("readHeaderBlock unfolds, lower-cases and keeps the first occurrence", () => {
  const headers = readHeaderBlock(
    "From: Alice <alice@example.com>\r\nSubject: Hello\r\n  world\r\nsubject: second\r\nbogus line\r\n\r\nBody: not a header\r\n"
  );
  assert.deepEqual([...headers.entries()], [
    ["from", "Alice <alice@example.com>"],
    ["subject", "Hello  world"]
  ]);
});

test("readHeaderBlock decodes raw bytes", () => {
  const headers = readHeaderBlock(Buffer.from("X-Sender: a@b.org\n\nbody"));
  assert.equal(headers.get("x-sender"), "a@b.org");
});

test("an empty message has no headers", () => {
  assert.equal(readHeaderBlock("").size, 0);
});

test("NUL characters are dropped from header values", () => {
  const headers = readHeaderBlock(Buffer.from("Subject: hi\u0000there\r\nFrom: a\u0000@b.org\r\n\r\n"));
  assert.equal(headers.get("subject"), "hithere");
  assert.equal(headers.get("from"), "a@b.org");
});
