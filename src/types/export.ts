/**
 * Type definitions for graph export documents
 *
 * Two shapes exist:
 * - property-graph: nodes + relationships (and optionally a ready-made Cypher script)
 * - tensor: per-type feature matrices + per-triplet edge index matrices
 */

/**
 * Property values are kept as parsed from JSON.
 * Coercion to what Neo4j accepts happens in the client layer (see runtime/client/values.ts).
 */
export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue };

export type PropertyMap = Record<string, PropertyValue>;

/** Identifier assigned by the export producer */
export type ExternalId = string | number;

export interface ExportedNode {
  id: ExternalId;
  /** Never empty (defaults to a single generic label) */
  labels: string[];
  properties: PropertyMap;
}

export interface ExportedRelationship {
  type: string;
  /** null when the export omitted the endpoint: fails resolution at write time */
  startNodeId: ExternalId | null;
  endNodeId: ExternalId | null;
  properties: PropertyMap;
}

export interface PropertyGraphExport {
  kind: 'property-graph';
  nodes: ExportedNode[];
  relationships: ExportedRelationship[];
  /** Semicolon-separated Cypher statements, for producers that emit ready-made statements */
  cypherScript?: string;
}

/** Rows of numbers (row-major) */
export type NumericMatrix = number[][];

export interface TensorExport {
  kind: 'tensor';
  /** node type -> [rows][features] */
  nodeFeatures: Record<string, NumericMatrix>;
  /** node type -> human-readable label per row */
  nodeLabels: Record<string, string[]>;
  /** "src,rel,dst" -> [[sourceIndices...], [destinationIndices...]] */
  edgeIndices: Record<string, NumericMatrix>;
  /** "src,rel,dst" -> [edges][features] */
  edgeFeatures: Record<string, NumericMatrix>;
}

export type ExportDocument = PropertyGraphExport | TensorExport;

export interface EdgeTriplet {
  source: string;
  relation: string;
  destination: string;
}

export const DEFAULT_NODE_LABEL = 'Node';
export const DEFAULT_RELATIONSHIP_TYPE = 'RELATED_TO';
