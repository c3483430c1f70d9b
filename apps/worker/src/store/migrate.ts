import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { withTransaction } from "./pg-store.js";
import type { ClientSource } from "./types.js";

export const MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations/", import.meta.url));

const CREATE_LEDGER = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    name        TEXT PRIMARY KEY,
    applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

/**
 * Applies every `*.sql` file of the directory in name order, each in its own
 * transaction, skipping the ones already recorded in `schema_migrations`.
 * Returns the names applied by this run.
 */
export async function runMigrations(source: ClientSource, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = (await readdir(dir)).filter((file) => file.endsWith(".sql")).sort();
  const applied: string[] = [];

  for (const file of files) {
    const sql = await readFile(path.join(dir, file), "utf8");
    const ran = await withTransaction(source, async (client) => {
      await client.query(CREATE_LEDGER);
      const existing = await client.query("SELECT 1 FROM schema_migrations WHERE name = $1", [file]);
      if (existing.rows.length > 0) {
        return false;
      }
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
      return true;
    });
    if (ran) {
      applied.push(file);
    }
  }

  return applied;
}
