import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { MIGRATIONS_DIR, runMigrations } from "./migrate.js";
import { RecordingSource } from "./recording-source.js";

test("runMigrations applies new files in name order and skips recorded ones", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "list-archive-migrations-"));
  await writeFile(path.join(dir, "002_more.sql"), "CREATE TABLE b (id INT)");
  await writeFile(path.join(dir, "001_base.sql"), "CREATE TABLE a (id INT)");
  await writeFile(path.join(dir, "notes.txt"), "ignored");

  const source = new RecordingSource((text, values) =>
    text.startsWith("SELECT 1 FROM schema_migrations") && values[0] === "001_base.sql" ? [{ "?column?": 1 }] : undefined
  );

  assert.deepEqual(await runMigrations(source, dir), ["002_more.sql"]);
  const statements = source.statements();
  assert.equal(statements.includes("CREATE TABLE a (id INT)"), false);
  assert.deepEqual(statements.slice(-4), [
    "SELECT 1 FROM schema_migrations WHERE name = $1",
    "CREATE TABLE b (id INT)",
    "INSERT INTO schema_migrations (name) VALUES ($1)",
    "COMMIT"
  ]);
  assert.equal(source.released, 2);
});

test("the bundled migration directory holds the archive schema", async () => {
  const source = new RecordingSource();
  assert.deepEqual(await runMigrations(source, MIGRATIONS_DIR), ["001_archive.sql"]);
});
