import type { ClientSource, QueryClient, QueryResultLike, QueryRow } from "./types.js";

export type RecordedQuery = {
  text: string;
  values: unknown[];
};

type Responder = (text: string, values: unknown[]) => QueryRow[] | Error | undefined;

/**
 * In-process stand-in for a pg pool: every statement is recorded with its
 * parameters, and `respond` decides what each one returns or throws.
 */
export class RecordingSource implements ClientSource {
  readonly queries: RecordedQuery[] = [];
  released = 0;

  constructor(private readonly respond: Responder = () => undefined) {}

  async connect(): Promise<QueryClient> {
    return {
      query: async (text: string, values: unknown[] = []): Promise<QueryResultLike> => {
        const compact = text.replace(/\s+/g, " ").trim();
        this.queries.push({ text: compact, values });
        const response = this.respond(compact, values);
        if (response instanceof Error) {
          throw response;
        }
        const rows = response ?? [];
        return { rows, rowCount: rows.length };
      },
      release: () => {
        this.released += 1;
      }
    };
  }

  statements(): string[] {
    return this.queries.map((query) => query.text);
  }
}
