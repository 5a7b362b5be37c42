/**
 * Quote & Placeholder Translator
 *
 * Converts MySQL-style statements emitted by the ORM into T-SQL surface syntax:
 *
 *   `users`  →  [users]
 *   ?        →  @p1, @p2, … (left to right)
 *
 * One forward scan. Back-ticks and question marks inside single-quoted string
 * literals are data and are copied as-is; a doubled quote ('') inside a literal
 * is an escaped quote and does not end it.
 *
 * Never throws. An odd number of back-ticks or an unterminated literal yields
 * best-effort output.
 */

export function translate(query: string): string {
  let out = '';
  let openBracket = true;
  let inString = false;
  let param = 1;

  for (let i = 0; i < query.length; i++) {
    const c = query.charAt(i);

    switch (c) {
      case "'":
        out += c;
        if (inString) {
          if (query.charAt(i + 1) === "'") {
            out += "'";
            i++;
            continue;
          }
          inString = false;
        } else {
          inString = true;
        }
        break;

      case '`':
        if (inString) {
          out += c;
          break;
        }
        out += openBracket ? '[' : ']';
        openBracket = !openBracket;
        break;

      case '?':
        if (inString) {
          out += c;
          break;
        }
        out += `@p${param}`;
        param++;
        break;

      default:
        out += c;
    }
  }

  return out;
}
