const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function assertIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) throw new RangeError(`not a plain SQL identifier: ${JSON.stringify(name)}`);
  return name;
}

/** Index just past the end of the quoted run starting at `start`; `''` inside the run is an escaped quote. */
function skipQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i += 1;
  }
  return sql.length;
}

/**
 * Rewrites `?` positional placeholders into the engine's own spelling.
 * String literals, quoted identifiers, dollar-quoted bodies and comments are
 * copied untouched. `??` stands for a literal `?`.
 */
export function bindPlaceholders(sql: string, paramCount: number, placeholder: (index: number) => string): string {
  let out = '';
  let index = 0;
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "'" || ch === '"') {
      const end = skipQuoted(sql, i, ch);
      out += sql.slice(i, end);
      i = end;
    } else if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      out += sql.slice(i, end);
      i = end;
    } else if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      const end = close === -1 ? sql.length : close + 2;
      out += sql.slice(i, end);
      i = end;
    } else if (ch === '$') {
      const tag = /^\$[A-Za-z_]*\$/.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        const end = close === -1 ? sql.length : close + tag[0].length;
        out += sql.slice(i, end);
        i = end;
      } else {
        out += ch;
        i += 1;
      }
    } else if (ch === '?') {
      if (next === '?') {
        out += '?';
        i += 2;
      } else {
        index += 1;
        out += placeholder(index);
        i += 1;
      }
    } else {
      out += ch;
      i += 1;
    }
  }

  if (index !== paramCount) {
    throw new RangeError(`statement has ${index} placeholder(s) but ${paramCount} parameter(s) were given`);
  }
  return out;
}

export function assertPage(limit: number, offset: number): void {
  if (!Number.isInteger(limit) || limit < 0) throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  if (!Number.isInteger(offset) || offset < 0) throw new RangeError(`offset must be a non-negative integer, got ${offset}`);
}
