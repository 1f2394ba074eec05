/**
 * Query safety checks
 *
 * A conservative lexical filter, not a parser: any occurrence of a denylisted
 * keyword (case-insensitive, anywhere in the text, including inside words and
 * string literals) rejects the query. False positives such as `OFFSET` or a
 * property named `dataset` are accepted as the cost.
 *
 * This is the second line of defense. Gateway queries also run in read
 * transactions, which the server refuses to write from.
 */

export const MUTATION_KEYWORDS = [
  'CREATE',
  'MERGE',
  'DELETE',
  'SET',
  'DROP',
  'REMOVE',
  'CALL DBMS',
  'LOAD CSV',
] as const;

export type MutationKeyword = (typeof MUTATION_KEYWORDS)[number];

export type QueryClassification =
  | { safe: true }
  | { safe: false; keyword: MutationKeyword };

export const DEFAULT_RESULT_LIMIT = 25;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Multi-word entries match across any whitespace run ("LOAD\n  CSV")
const KEYWORD_PATTERNS = MUTATION_KEYWORDS.map(keyword => ({
  keyword,
  pattern: new RegExp(keyword.split(' ').map(escapeRegExp).join('\\s+'), 'i'),
}));

export function classifyQuery(query: string): QueryClassification {
  for (const { keyword, pattern } of KEYWORD_PATTERNS) {
    if (pattern.test(query)) {
      return { safe: false, keyword };
    }
  }
  return { safe: true };
}

export function isReadOnlyQuery(query: string): boolean {
  return classifyQuery(query).safe;
}

/**
 * Append a LIMIT when the query has none (checked as a case-insensitive substring).
 * Trailing whitespace and semicolons are dropped before appending.
 */
export function applyResultBound(query: string, limit: number = DEFAULT_RESULT_LIMIT): string {
  if (/limit/i.test(query)) {
    return query;
  }
  return `${query.replace(/[\s;]+$/, '')}\nLIMIT ${limit}`;
}
