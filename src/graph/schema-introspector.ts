/**
 * Schema Introspector
 *
 * Describes the current graph for an agent writing Cypher: labels,
 * relationship types, global property keys, and for each label the property
 * keys seen most often on a small sample of its nodes.
 *
 * Read-only, recomputed on every call. Store errors propagate unchanged.
 */

import neo4j from 'neo4j-driver';
import type { CypherRunner } from '../runtime/client/neo4j-client.js';
import { quoteIdentifier } from '../runtime/client/cypher.js';

export interface SchemaSummary {
  labels: string[];
  relationshipTypes: string[];
  propertyKeys: string[];
  /** label -> most frequent property keys, most frequent first */
  labelProperties: Record<string, string[]>;
}

export interface IntrospectionOptions {
  /** Labels sampled for per-label properties (default: 30) */
  labelLimit?: number;
  /** Nodes sampled per label (default: 50) */
  sampleSize?: number;
  /** Property keys kept per label (default: 20) */
  propertyLimit?: number;
}

export const DEFAULT_INTROSPECTION_OPTIONS: Required<IntrospectionOptions> = {
  labelLimit: 30,
  sampleSize: 50,
  propertyLimit: 20,
};

export async function introspectSchema(
  runner: CypherRunner,
  options: IntrospectionOptions = {}
): Promise<SchemaSummary> {
  const { labelLimit, sampleSize, propertyLimit } = { ...DEFAULT_INTROSPECTION_OPTIONS, ...options };

  const labels = await collectColumn(
    runner,
    'CALL db.labels() YIELD label RETURN label ORDER BY label',
    'label'
  );
  const relationshipTypes = await collectColumn(
    runner,
    'CALL db.relationshipTypes() YIELD relationshipType RETURN relationshipType ORDER BY relationshipType',
    'relationshipType'
  );
  const propertyKeys = await collectColumn(
    runner,
    'CALL db.propertyKeys() YIELD propertyKey RETURN propertyKey ORDER BY propertyKey',
    'propertyKey'
  );

  const labelProperties: Record<string, string[]> = {};
  for (const label of labels.slice(0, labelLimit)) {
    labelProperties[label] = await collectColumn(
      runner,
      `MATCH (n:${quoteIdentifier(label)})
       WITH n LIMIT $sampleSize
       UNWIND keys(n) AS key
       RETURN key, count(*) AS occurrences
       ORDER BY occurrences DESC, key
       LIMIT $propertyLimit`,
      'key',
      { sampleSize: neo4j.int(sampleSize), propertyLimit: neo4j.int(propertyLimit) }
    );
  }

  return { labels, relationshipTypes, propertyKeys, labelProperties };
}

async function collectColumn(
  runner: CypherRunner,
  query: string,
  column: string,
  params?: Record<string, unknown>
): Promise<string[]> {
  const result = await runner.run(query, params);
  return result.records.map(record => String(record.get(column)));
}
