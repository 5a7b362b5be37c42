/**
 * Limit/Offset Rewriter — trailing LIMIT clauses → T-SQL pagination
 *
 *   ... ORDER BY x LIMIT n        →  ... ORDER BY x OFFSET 0 ROWS FETCH NEXT n ROWS ONLY
 *   SELECT ... LIMIT n            →  SELECT TOP n ...
 *   ... LIMIT n OFFSET m          →  ... [ORDER BY (SELECT NULL)] OFFSET m ROWS FETCH NEXT n ROWS ONLY
 *
 * Only a clause at the very end of the statement is recognized. Anything else
 * (subqueries with their own LIMIT, bound LIMIT parameters, no SELECT keyword
 * on the TOP path) is returned unchanged.
 */

const LIMIT_ONLY = /\s+LIMIT\s+(\d+)\s*$/i;
const LIMIT_OFFSET = /\s+LIMIT\s+(\d+)\s+OFFSET\s+(\d+)\s*$/i;
const ORDER_BY = /\sORDER\s+BY\s/i;
const SELECT_KEYWORD = /\bselect\b/i;

export function rewriteLimit(query: string): string {
  const trimmed = query.trim();

  const withOffset = LIMIT_OFFSET.exec(trimmed);
  if (withOffset) {
    const [clause, limit, offset] = withOffset;
    let base = stripClause(trimmed, clause);
    // OFFSET/FETCH is only valid after an ORDER BY
    if (!ORDER_BY.test(base)) {
      base += ' ORDER BY (SELECT NULL)';
    }
    return `${base} OFFSET ${offset} ROWS FETCH NEXT ${limit} ROWS ONLY`;
  }

  const limitOnly = LIMIT_ONLY.exec(trimmed);
  if (limitOnly) {
    const [clause, limit] = limitOnly;
    const base = stripClause(trimmed, clause);

    if (ORDER_BY.test(base)) {
      return `${base} OFFSET 0 ROWS FETCH NEXT ${limit} ROWS ONLY`;
    }

    // keyword, not a substring of an identifier
    const select = SELECT_KEYWORD.exec(base);
    if (select) {
      const insertAt = select.index + select[0].length;
      return `${base.slice(0, insertAt)} TOP ${limit}${base.slice(insertAt)}`;
    }
  }

  return query;
}

function stripClause(statement: string, clause: string): string {
  return statement.slice(0, statement.length - clause.length).trim();
}
