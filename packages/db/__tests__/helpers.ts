/**
 * Scripted stand-in for a pg Pool: queries are answered in order from a
 * queue of canned results (or errors) and every call is recorded.
 */

import type { PgPool, PgPoolClient, QueryResultLike } from "../src/index.js";

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

export class ScriptedPool implements PgPool {
  readonly calls: RecordedQuery[] = [];
  released = 0;
  ended = false;
  private readonly script: Array<QueryResultLike | Error> = [];

  respond(...results: Array<QueryResultLike | Error>): this {
    this.script.push(...results);
    return this;
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResultLike> {
    this.calls.push({ text: text.replace(/\s+/g, " ").trim(), values });
    const next = this.script.shift() ?? { rows: [], rowCount: 0 };
    if (next instanceof Error) throw next;
    return next;
  }

  async connect(): Promise<PgPoolClient> {
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

export function rows(...items: unknown[]): QueryResultLike {
  return { rows: items, rowCount: items.length };
}

export const ok: QueryResultLike = { rows: [], rowCount: null };
