/**
 * Text rendering of import results and database statistics
 */

import type { GraphStats } from '../../src/graph/stats.js';
import { formatFailure, type ImportOutcome, type ScriptOutcome } from '../../src/ingestion/outcome.js';

export function formatStats(stats: GraphStats): string {
  const lines = [
    `   Nodes: ${stats.nodeCount}`,
    `   Relationships: ${stats.edgeCount}`,
    `   Labels: ${stats.labels.length > 0 ? stats.labels.join(', ') : 'none'}`,
    `   Relationship Types: ${stats.relationshipTypes.length > 0 ? stats.relationshipTypes.join(', ') : 'none'}`,
  ];
  return lines.join('\n');
}

export function formatImportOutcome(outcome: ImportOutcome): string {
  const lines = [
    `   Nodes created: ${outcome.nodesCreated}/${outcome.nodesAttempted}`,
    `   Relationships created: ${outcome.relationshipsCreated}/${outcome.relationshipsAttempted}`,
  ];
  if (outcome.identityMarkersRemoved > 0) {
    lines.push(`   Identity markers removed: ${outcome.identityMarkersRemoved}`);
  }
  return lines.concat(formatFailures(outcome.failures.map(formatFailure))).join('\n');
}

export function formatScriptOutcome(outcome: ScriptOutcome): string {
  const lines = [`   Statements executed: ${outcome.statementsExecuted}/${outcome.statementsAttempted}`];
  return lines.concat(formatFailures(outcome.failures.map(formatFailure))).join('\n');
}

function formatFailures(failures: string[]): string[] {
  if (failures.length === 0) {
    return [];
  }
  return [`   Failures (${failures.length}):`, ...failures.map(failure => `     ✗ ${failure}`)];
}
