import assert from "node:assert/strict";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { ArchiveFileError } from "../errors.js";
import { folderExportPath, parseFolderExport, readFolderExport, readListsFile } from "./folder-file.js";

const RAW = "From: a@example.org\r\n\r\nhi\r\n";

test("readFolderExport decodes every message of a folder file", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "list-archive-"));
  try {
    await mkdir(path.join(dir, "lists"));
    await writeFile(
      path.join(dir, "lists", "quic.json"),
      JSON.stringify({
        fetched: "2024-05-01T10:00:00",
        folder: "quic",
        uidvalidity: 1234,
        msgs: [{ uid: 7, msg: Buffer.from(RAW).toString("base64") }]
      })
    );

    const folder = await readFolderExport(dir, "quic");
    assert.equal(folder.mailingList, "quic");
    assert.equal(folder.uidvalidity, 1234);
    assert.equal(folder.fetched, "2024-05-01T10:00:00");
    assert.equal(folder.messages.length, 1);
    assert.equal(folder.messages[0].uid, 7);
    assert.equal(Buffer.from(folder.messages[0].raw).toString("utf8"), RAW);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("a missing folder file is an ArchiveFileError", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "list-archive-"));
  try {
    await assert.rejects(
      readFolderExport(dir, "absent"),
      (error: unknown) => error instanceof ArchiveFileError && error.message.endsWith(": ENOENT")
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("malformed folder files are rejected with the failing path", () => {
  assert.throws(
    () => parseFolderExport("lists/bad.json", { folder: "bad", uidvalidity: -1, msgs: [] }),
    (error: unknown) =>
      error instanceof ArchiveFileError && error.message.startsWith("Cannot read archive file lists/bad.json: uidvalidity:")
  );
  assert.throws(
    () => parseFolderExport("lists/bad.json", { folder: "bad", uidvalidity: 1, msgs: [{ uid: 1, msg: "not base64!" }] }),
    (error: unknown) =>
      error instanceof ArchiveFileError &&
      error.message === "Cannot read archive file lists/bad.json: msgs.0.msg: msg must be base64"
  );
});

test("folder names cannot escape the archive directory", () => {
  assert.equal(folderExportPath("/data", "quic"), path.join("/data", "lists", "quic.json"));
  assert.throws(() => folderExportPath("/data", "../etc"), ArchiveFileError);
});

test("readListsFile returns folder names in file order", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "list-archive-"));
  try {
    const file = path.join(dir, "lists.json");
    await writeFile(file, JSON.stringify({ fetched: "2024-05-01T10:00:00", folders: ["quic", "tls"] }));
    assert.deepEqual(await readListsFile(file), ["quic", "tls"]);
    await writeFile(file, "{");
    await assert.rejects(readListsFile(file), ArchiveFileError);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
