import type { Pool } from "pg";
import type { FolderSummary, Identity, MessageRecord, RawMessage } from "@list-archive/shared";
import type { ArchiveStore, ClientSource, FolderWriter, QueryClient, QueryRunner } from "./types.js";

export function poolSource(pool: Pool): ClientSource {
  return {
    async connect(): Promise<QueryClient> {
      const client = await pool.connect();
      return {
        async query(text, values) {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: () => client.release()
      };
    }
  };
}

export async function withTransaction<T>(
  source: ClientSource,
  callback: (client: QueryRunner) => Promise<T>
): Promise<T> {
  const client = await source.connect();

  try {
    await client.query("BEGIN");
    const result = await callback(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

/** TEXT columns reject NUL, which encoded words can still produce. */
function toText(value: string | null): string | null {
  return value === null ? null : value.replaceAll("\u0000", "");
}

function readMessageNum(value: unknown): number {
  const num = typeof value === "string" ? Number.parseInt(value, 10) : value;
  if (typeof num !== "number" || !Number.isSafeInteger(num)) {
    throw new Error(`Unexpected message_num returned by insert: ${String(value)}`);
  }
  return num;
}

async function insertRecipients(
  client: QueryRunner,
  table: "messages_to" | "messages_cc",
  messageNum: number,
  recipients: readonly Identity[]
): Promise<void> {
  const [nameColumn, addrColumn] = table === "messages_to" ? ["to_name", "to_addr"] : ["cc_name", "cc_addr"];
  for (const recipient of recipients) {
    await client.query(
      `INSERT INTO ${table} (message_num, ${nameColumn}, ${addrColumn}) VALUES ($1, $2, $3)`,
      [messageNum, toText(recipient.name), toText(recipient.address)]
    );
  }
}

class PgFolderWriter implements FolderWriter {
  constructor(private readonly client: QueryRunner) {}

  async insertMessage(message: RawMessage, record: MessageRecord): Promise<number> {
    const inserted = await this.client.query(
      `
        INSERT INTO messages (
          mailing_list, uidvalidity, uid, from_name, from_addr,
          subject, date, message_id, in_reply_to, raw_message
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        RETURNING message_num
      `,
      [
        message.mailingList,
        message.uidvalidity,
        message.uid,
        toText(record.from.name),
        toText(record.from.address),
        toText(record.subject),
        record.date,
        toText(record.messageId),
        toText(record.inReplyTo),
        Buffer.from(message.raw)
      ]
    );
    const messageNum = readMessageNum(inserted.rows[0]?.message_num);

    await insertRecipients(this.client, "messages_to", messageNum, record.to);
    await insertRecipients(this.client, "messages_cc", messageNum, record.cc);
    return messageNum;
  }

  async writeSummary(summary: FolderSummary): Promise<void> {
    await this.client.query(
      `
        INSERT INTO lists (name, msg_count, first_date, last_date)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (name) DO UPDATE
        SET
          msg_count = EXCLUDED.msg_count,
          first_date = EXCLUDED.first_date,
          last_date = EXCLUDED.last_date
      `,
      [summary.mailingList, summary.messageCount, summary.firstDate, summary.lastDate]
    );
  }
}

export class PgArchiveStore implements ArchiveStore {
  constructor(private readonly source: ClientSource) {}

  async writeFolder<T>(mailingList: string, write: (writer: FolderWriter) => Promise<T>): Promise<T> {
    return withTransaction(this.source, async (client) => {
      await client.query("DELETE FROM messages WHERE mailing_list = $1", [mailingList]);
      await client.query("DELETE FROM lists WHERE name = $1", [mailingList]);
      return write(new PgFolderWriter(client));
    });
  }
}
