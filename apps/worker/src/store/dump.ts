import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type { QueryRow, QueryRunner } from "./types.js";

type DumpSource = {
  table: "lists" | "messages" | "messages_to" | "messages_cc";
  key: string;
  columns: readonly string[];
  start: string | number;
};

export type DumpCounts = Record<DumpSource["table"], number>;

const DUMP_SOURCES: readonly DumpSource[] = [
  { table: "lists", key: "name", columns: ["name", "msg_count", "first_date", "last_date"], start: "" },
  {
    table: "messages",
    key: "message_num",
    columns: [
      "message_num",
      "mailing_list",
      "uidvalidity",
      "uid",
      "from_name",
      "from_addr",
      "subject",
      "date",
      "message_id",
      "in_reply_to"
    ],
    start: 0
  },
  { table: "messages_to", key: "id", columns: ["id", "message_num", "to_name", "to_addr"], start: 0 },
  { table: "messages_cc", key: "id", columns: ["id", "message_num", "cc_name", "cc_addr"], start: 0 }
];

export const DEFAULT_DUMP_PAGE_SIZE = 1000;

export function emptyDumpCounts(): DumpCounts {
  return { lists: 0, messages: 0, messages_to: 0, messages_cc: 0 };
}

/**
 * Yields the archive as JSON lines, `{"table": ..., "row": {...}}`, one table
 * after another, paging by primary key. Raw message bodies are left out.
 * Rows are tallied into `counts` as they are read.
 */
export async function* dumpArchiveLines(
  runner: QueryRunner,
  counts: DumpCounts = emptyDumpCounts(),
  pageSize: number = DEFAULT_DUMP_PAGE_SIZE
): AsyncGenerator<string> {
  for (const source of DUMP_SOURCES) {
    let after: unknown = source.start;
    for (;;) {
      const page = await runner.query(
        `SELECT ${source.columns.join(", ")} FROM ${source.table} WHERE ${source.key} > $1 ORDER BY ${source.key} LIMIT $2`,
        [after, pageSize]
      );
      counts[source.table] += page.rows.length;
      for (const row of page.rows) {
        yield JSON.stringify({ table: source.table, row: pickColumns(row, source.columns) });
      }
      const last = page.rows.at(-1);
      if (!last || page.rows.length < pageSize) {
        break;
      }
      after = last[source.key];
    }
  }
}

export async function dumpArchive(
  runner: QueryRunner,
  writeLine: (line: string) => Promise<void>,
  pageSize: number = DEFAULT_DUMP_PAGE_SIZE
): Promise<DumpCounts> {
  const counts = emptyDumpCounts();
  for await (const line of dumpArchiveLines(runner, counts, pageSize)) {
    await writeLine(line);
  }
  return counts;
}

/** Writes the dump to `outfile`; a failing write rejects instead of escaping as a stream error. */
export async function writeDumpFile(
  runner: QueryRunner,
  outfile: string,
  pageSize: number = DEFAULT_DUMP_PAGE_SIZE
): Promise<DumpCounts> {
  const counts = emptyDumpCounts();
  await pipeline(
    dumpArchiveLines(runner, counts, pageSize),
    async function* (lines: AsyncIterable<string>) {
      for await (const line of lines) {
        yield `${line}\n`;
      }
    },
    createWriteStream(outfile, { encoding: "utf8" })
  );
  return counts;
}

function pickColumns(row: QueryRow, columns: readonly string[]): QueryRow {
  return Object.fromEntries(columns.map((column) => [column, row[column] ?? null]));
}
