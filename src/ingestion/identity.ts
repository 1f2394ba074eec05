/**
 * Identity Resolver
 *
 * Maps an export's external node identifiers to the nodes created in the
 * store. The mapping is not held in memory: the external id is written on
 * each created node under a marker property, and relationship creation
 * re-locates endpoints by that property.
 */

import type { ExternalId, PropertyMap } from '../types/export.js';
import { quoteIdentifier } from '../runtime/client/cypher.js';
import { toStoreProperties, toStoreValue, type StoreValue } from '../runtime/client/values.js';
import type { CypherRunner } from '../runtime/client/neo4j-client.js';

export const DEFAULT_IDENTITY_PROPERTY = '_exportId';

export interface EndpointResolution {
  startFound: boolean;
  endFound: boolean;
}

export class IdentityCollisionError extends Error {
  constructor(public readonly property: string) {
    super(`Node already declares the identity property "${property}"`);
    this.name = 'IdentityCollisionError';
  }
}

export class IdentityResolver {
  private readonly markerKey: string;

  constructor(readonly property: string = DEFAULT_IDENTITY_PROPERTY) {
    this.markerKey = quoteIdentifier(property);
  }

  /**
   * Store-ready properties of a node, including the identity marker.
   * @throws IdentityCollisionError when the declared properties already use the marker name
   */
  markedProperties(id: ExternalId, properties: PropertyMap): Record<string, StoreValue> {
    if (Object.prototype.hasOwnProperty.call(properties, this.property)) {
      throw new IdentityCollisionError(this.property);
    }
    return { ...toStoreProperties(properties), [this.property]: this.storeId(id) };
  }

  storeId(id: ExternalId): StoreValue {
    // ExternalId is never null, so the conversion always yields a value
    return toStoreValue(id) ?? String(id);
  }

  /**
   * Pattern fragment matching a node by its marker, e.g. "{`_exportId`: $startId}"
   */
  matchFragment(parameter: string): string {
    return `{${this.markerKey}: $${parameter}}`;
  }

  /**
   * Look up both endpoints of a relationship by external id
   */
  async resolveEndpoints(
    runner: CypherRunner,
    startNodeId: ExternalId | null,
    endNodeId: ExternalId | null
  ): Promise<EndpointResolution> {
    if (startNodeId === null || endNodeId === null) {
      return {
        startFound: startNodeId !== null && (await this.exists(runner, startNodeId)),
        endFound: endNodeId !== null && (await this.exists(runner, endNodeId)),
      };
    }

    const result = await runner.run(
      `OPTIONAL MATCH (a ${this.matchFragment('startId')})
       WITH a LIMIT 1
       OPTIONAL MATCH (b ${this.matchFragment('endId')})
       WITH a, b LIMIT 1
       RETURN a IS NOT NULL AS startFound, b IS NOT NULL AS endFound`,
      { startId: this.storeId(startNodeId), endId: this.storeId(endNodeId) }
    );

    const record = result.records[0];
    return {
      startFound: record?.get('startFound') === true,
      endFound: record?.get('endFound') === true,
    };
  }

  private async exists(runner: CypherRunner, id: ExternalId): Promise<boolean> {
    const result = await runner.run(
      `OPTIONAL MATCH (n ${this.matchFragment('id')})
       WITH n LIMIT 1
       RETURN n IS NOT NULL AS found`,
      { id: this.storeId(id) }
    );
    return result.records[0]?.get('found') === true;
  }

  /**
   * Remove the marker from every node that carries it.
   * @returns number of nodes cleaned
   */
  async removeMarkers(runner: CypherRunner): Promise<number> {
    const result = await runner.run(
      `MATCH (n) WHERE n.${this.markerKey} IS NOT NULL
       REMOVE n.${this.markerKey}
       RETURN count(n) AS removed`
    );
    const removed = result.records[0]?.get('removed');
    return typeof removed === 'number' ? removed : 0;
  }
}
