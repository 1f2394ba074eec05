/**
 * Statement Splitter
 *
 * Splits a Cypher script on top-level semicolons. A semicolon does not end a
 * statement when it appears inside a string literal ('...' or "..."), a
 * quoted identifier (`...`), a line comment (// ...) or a block comment.
 */

type LexState = 'code' | 'single' | 'double' | 'backtick' | 'line-comment' | 'block-comment';

export function splitStatements(script: string): string[] {
  const statements: string[] = [];
  let state: LexState = 'code';
  let start = 0;

  for (let i = 0; i < script.length; i++) {
    const ch = script[i];
    const next = script[i + 1];

    switch (state) {
      case 'code':
        if (ch === ';') {
          statements.push(script.slice(start, i));
          start = i + 1;
        } else if (ch === "'") {
          state = 'single';
        } else if (ch === '"') {
          state = 'double';
        } else if (ch === '`') {
          state = 'backtick';
        } else if (ch === '/' && next === '/') {
          state = 'line-comment';
          i++;
        } else if (ch === '/' && next === '*') {
          state = 'block-comment';
          i++;
        }
        break;

      case 'single':
      case 'double':
        if (ch === '\\') {
          i++; // skip the escaped character
        } else if ((state === 'single' && ch === "'") || (state === 'double' && ch === '"')) {
          state = 'code';
        }
        break;

      case 'backtick':
        // `` inside a quoted identifier is an escaped backtick: leave and re-enter
        if (ch === '`') {
          state = 'code';
        }
        break;

      case 'line-comment':
        if (ch === '\n') {
          state = 'code';
        }
        break;

      case 'block-comment':
        if (ch === '*' && next === '/') {
          state = 'code';
          i++;
        }
        break;
    }
  }

  statements.push(script.slice(start));

  return statements.map(statement => statement.trim()).filter(statement => statement.length > 0);
}
