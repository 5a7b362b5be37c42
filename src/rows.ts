/**
 * In-memory Rows cursor over an already materialized result set.
 */

import type { Row, Rows } from './types.js';

export class ArrayRows implements Rows {
  readonly columns: readonly string[];
  private readonly data: readonly Row[];
  private cursor = 0;
  private closed = false;

  constructor(data: readonly Row[], columns?: readonly string[]) {
    this.data = data;
    this.columns = columns ?? Object.keys(data[0] ?? {});
  }

  async next(): Promise<Row | undefined> {
    if (this.closed || this.cursor >= this.data.length) return undefined;
    const row = this.data[this.cursor];
    this.cursor++;
    return row;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Row, void, undefined> {
    try {
      let row = await this.next();
      while (row !== undefined) {
        yield row;
        row = await this.next();
      }
    } finally {
      await this.close();
    }
  }
}

/** Drain a cursor into an array and close it. */
export async function collectRows(rows: Rows): Promise<Row[]> {
  const out: Row[] = [];
  for await (const row of rows) {
    out.push(row);
  }
  return out;
}
