import type { FolderSummary, MessageRecord, RawMessage } from "@list-archive/shared";

export type QueryRow = Record<string, unknown>;

export type QueryResultLike = {
  rows: QueryRow[];
  rowCount: number | null;
};

export interface QueryRunner {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface QueryClient extends QueryRunner {
  release(): void;
}

export interface ClientSource {
  connect(): Promise<QueryClient>;
}

export interface FolderWriter {
  /** Inserts the message row and its recipients in order; returns `message_num`. */
  insertMessage(message: RawMessage, record: MessageRecord): Promise<number>;
  writeSummary(summary: FolderSummary): Promise<void>;
}

/**
 * A folder is written by one writer at a time. `writeFolder` replaces whatever
 * the store held for the list, and nothing becomes visible unless `write`
 * resolves.
 */
export interface ArchiveStore {
  writeFolder<T>(mailingList: string, write: (writer: FolderWriter) => Promise<T>): Promise<T>;
}
