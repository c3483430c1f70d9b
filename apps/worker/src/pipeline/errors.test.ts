import assert from "node:assert/strict";
import test from "node:test";
import { z } from "zod";
import { ArchiveFileError, ConfigError } from "../errors.js";
import { isPermanentError, serializeError } from "./errors.js";

test("isPermanentError classifies archive, config and validation errors as permanent", () => {
  assert.equal(isPermanentError(new ArchiveFileError({ path: "lists/quic.json", reason: "missing" })), true);
  assert.equal(isPermanentError(new ConfigError({ issues: ["REDIS_URL: Invalid url"] })), true);
  const zodError = z.object({ folder: z.string() }).safeParse({});
  assert.equal(zodError.success, false);
  assert.equal(isPermanentError(zodError.success ? null : zodError.error), true);
});

test("isPermanentError treats store schema errors as permanent", () => {
  const missingTable = Object.assign(new Error('relation "messages" does not exist'), { code: "42P01" });
  const notNull = Object.assign(new Error("null value in column"), { code: "23502" });
  assert.equal(isPermanentError(missingTable), true);
  assert.equal(isPermanentError(notNull), true);
});

test("isPermanentError leaves transient errors to the retry policy", () => {
  const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
  const deadlock = Object.assign(new Error("deadlock detected"), { code: "40P01" });
  assert.equal(isPermanentError(reset), false);
  assert.equal(isPermanentError(deadlock), false);
  assert.equal(isPermanentError(new Error("Connection terminated unexpectedly")), false);
});

test("serializeError truncates long fields safely", () => {
  const error = new Error("x".repeat(700));
  error.stack = "s".repeat(2500);

  const serialized = serializeError(error);
  assert.equal(serialized.name, "Error");
  assert.equal(serialized.message.length, 501);
  assert.equal(serialized.stack?.length, 2001);
  assert.deepEqual(serializeError("plain"), { name: "UnknownError", message: "plain" });
});
