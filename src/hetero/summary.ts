import type { HeteroGraphSummary } from './types.js';

const RULE = '='.repeat(50);

/**
 * Render a structural summary (types and counts only, never buffer contents)
 */
export function formatHeteroSummary(summary: HeteroGraphSummary): string {
  const lines: string[] = [RULE, 'Heterogeneous Graph Summary', RULE, '', 'Node Types:'];

  if (summary.nodeTypes.length === 0) {
    lines.push('  (none)');
  }
  for (const node of summary.nodeTypes) {
    lines.push(`  - ${node.type}: ${node.numNodes} nodes, ${node.numFeatures} features`);
    if (node.labels) {
      lines.push(`    Labels: ${node.labels.join(', ')}`);
    }
  }

  lines.push('', 'Edge Types:');
  if (summary.edgeTypes.length === 0) {
    lines.push('  (none)');
  }
  for (const edge of summary.edgeTypes) {
    let line = `  - (${edge.source}) --[${edge.relation}]--> (${edge.destination}): ${edge.numEdges} edges`;
    if (edge.numFeatures !== null) {
      line += `, ${edge.numFeatures} features`;
    }
    lines.push(line);
  }

  lines.push('', RULE);
  return lines.join('\n');
}
