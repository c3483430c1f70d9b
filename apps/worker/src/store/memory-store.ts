import type { FolderSummary, Identity, MessageRecord, RawMessage } from "@list-archive/shared";
import type { ArchiveStore, FolderWriter } from "./types.js";

export type MemoryMessageRow = {
  messageNum: number;
  message: RawMessage;
  record: MessageRecord;
};

export type MemoryRecipientRow = {
  id: number;
  messageNum: number;
  name: string | null;
  address: string | null;
};

type FolderRows = {
  messages: MemoryMessageRow[];
  to: MemoryRecipientRow[];
  cc: MemoryRecipientRow[];
  summary: FolderSummary | null;
};

export class MemoryArchiveStore implements ArchiveStore {
  private readonly folders = new Map<string, FolderRows>();
  private nextMessageNum = 1;
  private nextRecipientId = 1;

  async writeFolder<T>(mailingList: string, write: (writer: FolderWriter) => Promise<T>): Promise<T> {
    const staged: FolderRows = { messages: [], to: [], cc: [], summary: null };
    const toRows = (messageNum: number, recipients: readonly Identity[]) =>
      recipients.map((recipient) => ({
        id: this.nextRecipientId++,
        messageNum,
        name: recipient.name,
        address: recipient.address
      }));

    const writer: FolderWriter = {
      insertMessage: async (message, record) => {
        const messageNum = this.nextMessageNum++;
        staged.messages.push({ messageNum, message, record });
        staged.to.push(...toRows(messageNum, record.to));
        staged.cc.push(...toRows(messageNum, record.cc));
        return messageNum;
      },
      writeSummary: async (summary) => {
        staged.summary = summary;
      }
    };

    const result = await write(writer);
    this.folders.set(mailingList, staged);
    return result;
  }

  messages(mailingList: string): MemoryMessageRow[] {
    return this.folders.get(mailingList)?.messages ?? [];
  }

  recipients(mailingList: string, field: "to" | "cc"): MemoryRecipientRow[] {
    return this.folders.get(mailingList)?.[field] ?? [];
  }

  summary(mailingList: string): FolderSummary | null {
    return this.folders.get(mailingList)?.summary ?? null;
  }

  summaries(): FolderSummary[] {
    return [...this.folders.values()].flatMap((rows) => (rows.summary ? [rows.summary] : []));
  }
}
