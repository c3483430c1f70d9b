import {
  DATE_SENTINEL_FIRST,
  DATE_SENTINEL_LAST,
  type FolderSummary,
  type MessageRecord
} from "@list-archive/shared";

/**
 * Per-folder running statistics. Dates compare as strings, which is exact for
 * the fixed `YYYY-MM-DD HH:MM:SS` form.
 */
export class FolderAggregator {
  private messageCount = 0;
  private datedCount = 0;
  private firstDate = DATE_SENTINEL_FIRST;
  private lastDate = DATE_SENTINEL_LAST;

  constructor(readonly mailingList: string) {}

  add(record: Pick<MessageRecord, "date">): void {
    this.messageCount += 1;
    if (record.date === null) {
      return;
    }
    this.datedCount += 1;
    if (record.date < this.firstDate) {
      this.firstDate = record.date;
    }
    if (record.date > this.lastDate) {
      this.lastDate = record.date;
    }
  }

  get count(): number {
    return this.messageCount;
  }

  /** A folder without dated messages reports an empty range. */
  summary(): FolderSummary {
    const hasRange = this.datedCount > 0;
    return {
      mailingList: this.mailingList,
      messageCount: this.messageCount,
      firstDate: hasRange ? this.firstDate : null,
      lastDate: hasRange ? this.lastDate : null
    };
  }
}
