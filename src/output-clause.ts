/**
 * Output-Clause Injector
 *
 * The ORM reads generated primary keys back as a row when it runs INSERTs
 * through the query path. SQL Server only returns them when asked:
 *
 *   INSERT INTO t (a) VALUES (1)  →  INSERT INTO t (a) OUTPUT INSERTED.[id] VALUES (1)
 */

const OUTPUT_CLAUSE = ' OUTPUT INSERTED.[id]';

export function injectOutputClause(query: string): string {
  const lower = query.toLowerCase();
  if (!lower.trimStart().startsWith('insert into')) return query;
  if (lower.includes(' output ')) return query;

  const idx = lower.indexOf(' values');
  if (idx === -1) return query;

  return query.slice(0, idx) + OUTPUT_CLAUSE + query.slice(idx);
}
