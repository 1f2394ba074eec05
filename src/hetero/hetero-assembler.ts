/**
 * Heterogeneous Graph Assembler
 *
 * Turns a tensor-shaped export into an immutable heterogeneous graph:
 * - one float feature matrix per node type
 * - one [2, E] index matrix per (source, relation, destination) triplet,
 *   with an optional [E, F] edge feature matrix
 *
 * Shape problems are fatal (ShapeMismatchError): numeric consumers cannot work
 * with ragged buffers, so nothing is clamped or padded.
 */

import { ShapeMismatchError } from '../errors.js';
import type { EdgeTriplet, NumericMatrix, TensorExport } from '../types/export.js';
import { formatTripletKey, parseTripletKey } from '../ingestion/export-parser.js';
import { createLogger, type Logger } from '../runtime/utils/logger.js';
import type {
  FeatureMatrix,
  HeteroEdgeGroup,
  HeteroGraphSummary,
  HeteroNodeGroup,
  IndexMatrix,
} from './types.js';

export interface AssembleOptions {
  logger?: Logger;
}

// ============================================
// Graph
// ============================================

/**
 * Typed arrays cannot be frozen, so node() and edge() hand out groups whose
 * buffers are fresh copies; writes to them never reach the graph.
 */
export class HeteroGraph {
  private readonly nodeGroups: ReadonlyMap<string, HeteroNodeGroup>;
  private readonly edgeGroups: ReadonlyMap<string, HeteroEdgeGroup>;

  constructor(nodeGroups: HeteroNodeGroup[], edgeGroups: HeteroEdgeGroup[]) {
    this.nodeGroups = new Map(nodeGroups.map(group => [group.type, Object.freeze(group)] as const));
    this.edgeGroups = new Map(
      edgeGroups.map(group => [formatTripletKey(group.triplet), Object.freeze(group)] as const)
    );
  }

  get nodeTypes(): string[] {
    return [...this.nodeGroups.keys()];
  }

  get edgeTypes(): EdgeTriplet[] {
    return [...this.edgeGroups.values()].map(group => ({ ...group.triplet }));
  }

  node(type: string): HeteroNodeGroup | undefined {
    const group = this.nodeGroups.get(type);
    return group && { ...group, x: copyFeatures(group.x) };
  }

  edge(triplet: EdgeTriplet | string): HeteroEdgeGroup | undefined {
    const group = this.edgeGroups.get(typeof triplet === 'string' ? triplet : formatTripletKey(triplet));
    if (!group) {
      return undefined;
    }
    return {
      ...group,
      triplet: { ...group.triplet },
      edgeIndex: { shape: group.edgeIndex.shape, data: group.edgeIndex.data.slice() },
      ...(group.edgeAttr ? { edgeAttr: copyFeatures(group.edgeAttr) } : {}),
    };
  }

  summary(): HeteroGraphSummary {
    return {
      nodeTypes: [...this.nodeGroups.values()].map(group => ({
        type: group.type,
        numNodes: group.numNodes,
        numFeatures: group.numFeatures,
        ...(group.labels ? { labels: [...group.labels] } : {}),
      })),
      edgeTypes: [...this.edgeGroups.values()].map(group => ({
        ...group.triplet,
        numEdges: group.numEdges,
        numFeatures: group.edgeAttr ? group.numFeatures : null,
      })),
    };
  }
}

function copyFeatures(matrix: FeatureMatrix): FeatureMatrix {
  return { shape: matrix.shape, data: matrix.data.slice() };
}

// ============================================
// Assembly
// ============================================

export function assembleHeteroGraph(tensor: TensorExport, options: AssembleOptions = {}): HeteroGraph {
  const logger = options.logger ?? createLogger('HeteroAssembler');

  const nodeGroups: HeteroNodeGroup[] = [];
  const rowCounts = new Map<string, number>();

  for (const [type, features] of Object.entries(tensor.nodeFeatures)) {
    const group = buildNodeGroup(type, features, tensor.nodeLabels[type], logger);
    nodeGroups.push(group);
    rowCounts.set(type, group.numNodes);
  }

  for (const type of Object.keys(tensor.nodeLabels)) {
    if (!rowCounts.has(type)) {
      logger.warn('Labels given for a node type without features, ignoring', { type });
    }
  }

  const edgeGroups: HeteroEdgeGroup[] = [];
  for (const [key, indices] of Object.entries(tensor.edgeIndices)) {
    const triplet = parseTripletKey(key);
    edgeGroups.push(buildEdgeGroup(key, triplet, indices, tensor.edgeFeatures[key], rowCounts));
  }

  for (const key of Object.keys(tensor.edgeFeatures)) {
    if (!(key in tensor.edgeIndices)) {
      logger.warn('Edge features given for a triplet without indices, ignoring', { triplet: key });
    }
  }

  logger.debug('Assembled heterogeneous graph', {
    nodeTypes: nodeGroups.length,
    edgeTypes: edgeGroups.length,
  });

  return new HeteroGraph(nodeGroups, edgeGroups);
}

function buildNodeGroup(
  type: string,
  features: NumericMatrix,
  labels: string[] | undefined,
  logger: Logger
): HeteroNodeGroup {
  const x = toFeatureMatrix(features, type, 'node feature');

  if (labels && labels.length !== x.shape[0]) {
    logger.warn('Node label count differs from node count', {
      type,
      labels: labels.length,
      nodes: x.shape[0],
    });
  }

  return {
    type,
    x,
    ...(labels ? { labels: Object.freeze([...labels]) } : {}),
    numNodes: x.shape[0],
    numFeatures: x.shape[1],
  };
}

function buildEdgeGroup(
  key: string,
  triplet: EdgeTriplet,
  indices: NumericMatrix,
  features: NumericMatrix | undefined,
  rowCounts: ReadonlyMap<string, number>
): HeteroEdgeGroup {
  if (indices.length !== 2) {
    throw new ShapeMismatchError(
      `Edge index for ${key} must have 2 rows (source, destination), got ${indices.length}`,
      key,
      { rows: indices.length }
    );
  }

  const [sources, destinations] = indices;
  if (sources.length !== destinations.length) {
    throw new ShapeMismatchError(
      `Edge index for ${key} has ${sources.length} sources but ${destinations.length} destinations`,
      key
    );
  }

  const numEdges = sources.length;
  checkIndices(key, sources, triplet.source, rowCounts.get(triplet.source) ?? 0);
  checkIndices(key, destinations, triplet.destination, rowCounts.get(triplet.destination) ?? 0);

  const data = new Int32Array(2 * numEdges);
  data.set(sources, 0);
  data.set(destinations, numEdges);
  const edgeIndex: IndexMatrix = Object.freeze({ shape: Object.freeze([2, numEdges] as const), data });

  // Omitted or empty sub-arrays mean "no edge features"
  if (!features || features.length === 0 || features[0].length === 0) {
    return { triplet: Object.freeze({ ...triplet }), edgeIndex, numEdges, numFeatures: 0 };
  }

  if (features.length !== numEdges) {
    throw new ShapeMismatchError(
      `Edge features for ${key} have ${features.length} rows but there are ${numEdges} edges`,
      key,
      { featureRows: features.length, edges: numEdges }
    );
  }

  const edgeAttr = toFeatureMatrix(features, key, 'edge feature');
  return { triplet: Object.freeze({ ...triplet }), edgeIndex, edgeAttr, numEdges, numFeatures: edgeAttr.shape[1] };
}

function checkIndices(key: string, indices: number[], nodeType: string, rowCount: number): void {
  for (const [position, index] of indices.entries()) {
    if (!Number.isInteger(index) || index < 0 || index >= rowCount) {
      throw new ShapeMismatchError(
        `Edge ${position} of ${key} references ${nodeType} row ${index}, ` +
        `but ${nodeType} has ${rowCount} rows`,
        key,
        { position, index, nodeType, rowCount }
      );
    }
  }
}

function toFeatureMatrix(rows: NumericMatrix, group: string, what: string): FeatureMatrix {
  const width = rows.length > 0 ? rows[0].length : 0;

  for (const [index, row] of rows.entries()) {
    if (row.length !== width) {
      throw new ShapeMismatchError(
        `Ragged ${what} rows in ${group}: row ${index} has ${row.length} values, expected ${width}`,
        group,
        { row: index, width: row.length, expected: width }
      );
    }
  }

  const data = new Float32Array(rows.length * width);
  rows.forEach((row, index) => data.set(row, index * width));
  const matrix: FeatureMatrix = { shape: Object.freeze([rows.length, width] as const), data };
  return Object.freeze(matrix);
}
