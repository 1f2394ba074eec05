/**
 * Cypher text helpers
 *
 * Labels, relationship types and property keys cannot be passed as query
 * parameters, so they are spliced into the query text as backtick-quoted
 * identifiers. Everything else goes through parameters.
 */

/**
 * Quote a name as a Cypher identifier (backticks doubled inside).
 */
export function quoteIdentifier(name: string): string {
  return '`' + name.replace(/`/g, '``') + '`';
}

/**
 * Build a label expression like ":`Person`:`Author`"
 */
export function labelExpression(labels: string[]): string {
  return labels.map(label => ':' + quoteIdentifier(label)).join('');
}
