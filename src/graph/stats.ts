/**
 * Graph statistics and node sampling
 */

import neo4j from 'neo4j-driver';
import type { CypherRunner } from '../runtime/client/neo4j-client.js';
import { quoteIdentifier } from '../runtime/client/cypher.js';

export interface GraphCounts {
  nodeCount: number;
  edgeCount: number;
}

export interface GraphStats extends GraphCounts {
  labels: string[];
  relationshipTypes: string[];
}

export const DEFAULT_SAMPLE_LIMIT = 5;

export async function getGraphCounts(runner: CypherRunner): Promise<GraphCounts> {
  const nodes = await runner.run('MATCH (n) RETURN count(n) AS count');
  const edges = await runner.run('MATCH ()-[r]->() RETURN count(r) AS count');
  return {
    nodeCount: readCount(nodes.records[0]?.get('count')),
    edgeCount: readCount(edges.records[0]?.get('count')),
  };
}

export async function getGraphStats(runner: CypherRunner): Promise<GraphStats> {
  const counts = await getGraphCounts(runner);

  const labels = await runner.run('CALL db.labels() YIELD label RETURN collect(label) AS labels');
  const types = await runner.run(
    'CALL db.relationshipTypes() YIELD relationshipType RETURN collect(relationshipType) AS types'
  );

  return {
    ...counts,
    labels: readStrings(labels.records[0]?.get('labels')),
    relationshipTypes: readStrings(types.records[0]?.get('types')),
  };
}

/**
 * Property maps of up to `limit` nodes with the given label
 */
export async function sampleNodes(
  runner: CypherRunner,
  label: string,
  limit: number = DEFAULT_SAMPLE_LIMIT
): Promise<Record<string, unknown>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Sample limit must be a positive integer, got ${limit}`);
  }

  const result = await runner.run(
    `MATCH (n:${quoteIdentifier(label)})
     RETURN n {.*} AS node
     LIMIT $limit`,
    { limit: neo4j.int(limit) }
  );

  return result.records.map(record => {
    const node = record.get('node');
    return typeof node === 'object' && node !== null ? Object.fromEntries(Object.entries(node)) : {};
  });
}

/**
 * Remove every node and relationship
 */
export async function clearGraph(runner: CypherRunner): Promise<void> {
  await runner.run('MATCH (n) DETACH DELETE n');
}

function readCount(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

function readStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.map(String) : [];
}
