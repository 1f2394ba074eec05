/**
 * Property-Graph Writer
 *
 * Loads a property-graph export into Neo4j in two phases:
 *   1. every node, in input order, each carrying its identity marker
 *   2. every relationship, in input order, linking endpoints found by marker
 *
 * Phase order is mandatory: relationships can only resolve endpoints created
 * in phase one. Each node / relationship is created independently; failures
 * are recorded in the outcome and never abort the import. Nothing is retried.
 *
 * Labels and relationship types are the only parts spliced into query text
 * (quoted as identifiers); all values travel as parameters.
 */

import { describeError } from '../errors.js';
import {
  DEFAULT_NODE_LABEL,
  DEFAULT_RELATIONSHIP_TYPE,
  type ExportedNode,
  type ExportedRelationship,
  type PropertyGraphExport,
} from '../types/export.js';
import { labelExpression, quoteIdentifier } from '../runtime/client/cypher.js';
import type { CypherRunner } from '../runtime/client/neo4j-client.js';
import { toStoreProperties } from '../runtime/client/values.js';
import { createLogger, type Logger } from '../runtime/utils/logger.js';
import { elapsedMs } from '../runtime/utils/timestamp.js';
import { DEFAULT_IDENTITY_PROPERTY, IdentityResolver } from './identity.js';
import {
  ImportOutcomeAccumulator,
  type EntityCreationFailure,
  type ImportOutcome,
} from './outcome.js';

// ============================================
// Types
// ============================================

export interface PropertyGraphWriterOptions {
  /** Marker property holding the external id (default: _exportId) */
  identityProperty?: string;
  /** Remove the marker from all nodes once relationships are linked (default: false) */
  removeIdentityProperty?: boolean;
  /** Label for nodes without labels (default: Node) */
  defaultLabel?: string;
  /** Type for relationships without a type (default: RELATED_TO) */
  defaultRelationshipType?: string;
  logger?: Logger;
  /** Called after every entity, for progress display */
  onProgress?: (event: WriteProgressEvent) => void;
}

export type WriteProgressEvent =
  | { status: 'created'; entity: 'node' | 'relationship'; description: string }
  | { status: 'failed'; failure: EntityCreationFailure };

// ============================================
// Writer
// ============================================

export class PropertyGraphWriter {
  private readonly identity: IdentityResolver;
  private readonly defaultLabel: string;
  private readonly defaultRelationshipType: string;
  private readonly removeIdentityProperty: boolean;
  private readonly logger: Logger;
  private readonly onProgress?: (event: WriteProgressEvent) => void;

  constructor(options: PropertyGraphWriterOptions = {}) {
    this.identity = new IdentityResolver(options.identityProperty ?? DEFAULT_IDENTITY_PROPERTY);
    this.defaultLabel = options.defaultLabel || DEFAULT_NODE_LABEL;
    this.defaultRelationshipType = options.defaultRelationshipType || DEFAULT_RELATIONSHIP_TYPE;
    this.removeIdentityProperty = options.removeIdentityProperty ?? false;
    this.logger = options.logger ?? createLogger('PropertyGraphWriter');
    this.onProgress = options.onProgress;
  }

  async write(runner: CypherRunner, graph: PropertyGraphExport): Promise<ImportOutcome> {
    const started = performance.now();
    const outcome = new ImportOutcomeAccumulator();

    this.logger.info('Creating nodes', { count: graph.nodes.length });
    for (const node of graph.nodes) {
      outcome.nodeAttempted();
      if (await this.createNode(runner, node, outcome)) {
        outcome.nodeCreated();
      }
    }

    this.logger.info('Creating relationships', { count: graph.relationships.length });
    for (const [index, relationship] of graph.relationships.entries()) {
      outcome.relationshipAttempted();
      if (await this.createRelationship(runner, relationship, index, outcome)) {
        outcome.relationshipCreated();
      }
    }

    // Nodes and relationships are already written; a failed cleanup leaves the
    // markers in place and the counts stand
    if (this.removeIdentityProperty) {
      try {
        const removed = await this.identity.removeMarkers(runner);
        outcome.markersRemoved(removed);
        this.logger.info('Removed identity markers', { property: this.identity.property, nodes: removed });
      } catch (error) {
        this.logger.error('Failed to remove identity markers', {
          property: this.identity.property,
          reason: describeError(error),
        });
      }
    }

    const result = outcome.toOutcome();
    this.logger.info('Import finished', {
      nodesCreated: result.nodesCreated,
      nodesAttempted: result.nodesAttempted,
      relationshipsCreated: result.relationshipsCreated,
      relationshipsAttempted: result.relationshipsAttempted,
      failures: result.failures.length,
      durationMs: elapsedMs(started),
    });
    return result;
  }

  private async createNode(
    runner: CypherRunner,
    node: ExportedNode,
    outcome: ImportOutcomeAccumulator
  ): Promise<boolean> {
    const labels = node.labels.length > 0 ? node.labels : [this.defaultLabel];

    try {
      const props = this.identity.markedProperties(node.id, node.properties);
      await runner.run(`CREATE (n${labelExpression(labels)} $props)`, { props });
    } catch (error) {
      this.recordFailure(outcome, {
        entity: 'node',
        externalId: node.id,
        labels,
        reason: describeError(error),
      });
      return false;
    }

    const name = node.properties.label ?? node.id;
    this.logger.debug('Created node', { id: node.id, labels });
    this.onProgress?.({
      status: 'created',
      entity: 'node',
      description: `${labels.join(':')}: ${typeof name === 'string' ? name : JSON.stringify(name)}`,
    });
    return true;
  }

  private async createRelationship(
    runner: CypherRunner,
    relationship: ExportedRelationship,
    index: number,
    outcome: ImportOutcomeAccumulator
  ): Promise<boolean> {
    const type = relationship.type || this.defaultRelationshipType;
    const { startNodeId, endNodeId } = relationship;
    const fail = (reason: string): false => {
      this.recordFailure(outcome, {
        entity: 'relationship',
        index,
        type,
        startNodeId,
        endNodeId,
        reason,
      });
      return false;
    };

    try {
      const { startFound, endFound } = await this.identity.resolveEndpoints(runner, startNodeId, endNodeId);
      if (!startFound || !endFound || startNodeId === null || endNodeId === null) {
        return fail(describeMissingEndpoints(startFound, endFound));
      }

      const result = await runner.run(
        `MATCH (a ${this.identity.matchFragment('startId')})
         WITH a LIMIT 1
         MATCH (b ${this.identity.matchFragment('endId')})
         WITH a, b LIMIT 1
         CREATE (a)-[r:${quoteIdentifier(type)} $props]->(b)
         RETURN count(r) AS created`,
        {
          startId: this.identity.storeId(startNodeId),
          endId: this.identity.storeId(endNodeId),
          props: toStoreProperties(relationship.properties),
        }
      );

      if (result.records[0]?.get('created') !== 1) {
        return fail('endpoints could not be matched at creation time');
      }
    } catch (error) {
      return fail(describeError(error));
    }

    this.logger.debug('Created relationship', { type, startNodeId, endNodeId });
    this.onProgress?.({
      status: 'created',
      entity: 'relationship',
      description: `[${type}]: ${String(startNodeId)} -> ${String(endNodeId)}`,
    });
    return true;
  }

  private recordFailure(outcome: ImportOutcomeAccumulator, failure: EntityCreationFailure): void {
    outcome.fail(failure);
    this.logger.warn(`Failed to create ${failure.entity}`, { ...failure });
    this.onProgress?.({ status: 'failed', failure });
  }
}

function describeMissingEndpoints(startFound: boolean, endFound: boolean): string {
  if (!startFound && !endFound) {
    return 'start and end nodes not found';
  }
  return startFound ? 'end node not found' : 'start node not found';
}
