/**
 * Rewrite pipelines for the two statement paths.
 *
 * Exec path:  translate → rewriteLimit
 * Query path: translate → rewriteLimit → injectOutputClause
 *
 * Only the text changes. Callers forward the original argument list as-is.
 */

import { translate } from './translate.js';
import { rewriteLimit } from './limit.js';
import { injectOutputClause } from './output-clause.js';

export function rewriteExec(query: string): string {
  return rewriteLimit(translate(query));
}

export function rewriteQuery(query: string): string {
  return injectOutputClause(rewriteLimit(translate(query)));
}
