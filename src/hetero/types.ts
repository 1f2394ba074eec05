/**
 * Heterogeneous graph types
 *
 * Buffers are dense row-major typed arrays with an explicit shape, ready to be
 * handed to a numeric library. Groups read from a HeteroGraph carry their own
 * copies of the buffers, which belong to the caller.
 */

import type { EdgeTriplet } from '../types/export.js';

/** [rows, columns] float32 matrix */
export interface FeatureMatrix {
  readonly shape: readonly [number, number];
  readonly data: Float32Array;
}

/** [2, edges] int32 matrix: row 0 = source indices, row 1 = destination indices */
export interface IndexMatrix {
  readonly shape: readonly [2, number];
  readonly data: Int32Array;
}

export interface HeteroNodeGroup {
  readonly type: string;
  /** Node features, one row per node; the row number is the node's index within its type */
  readonly x: FeatureMatrix;
  /** Human-readable label per row, when the export provided them */
  readonly labels?: readonly string[];
  readonly numNodes: number;
  readonly numFeatures: number;
}

export interface HeteroEdgeGroup {
  readonly triplet: EdgeTriplet;
  readonly edgeIndex: IndexMatrix;
  /** [edges, features], only when the export had non-empty edge features */
  readonly edgeAttr?: FeatureMatrix;
  readonly numEdges: number;
  /** 0 when there are no edge features */
  readonly numFeatures: number;
}

export interface NodeTypeSummary {
  type: string;
  numNodes: number;
  numFeatures: number;
  labels?: string[];
}

export interface EdgeTypeSummary {
  source: string;
  relation: string;
  destination: string;
  numEdges: number;
  /** null when the edge group has no features */
  numFeatures: number | null;
}

export interface HeteroGraphSummary {
  nodeTypes: NodeTypeSummary[];
  edgeTypes: EdgeTypeSummary[];
}

/**
 * Read one row of a matrix as plain numbers
 */
export function matrixRow(matrix: FeatureMatrix | IndexMatrix, row: number): number[] {
  const [rows, columns] = matrix.shape;
  if (row < 0 || row >= rows) {
    throw new RangeError(`Row ${row} out of range (0..${rows - 1})`);
  }
  return Array.from(matrix.data.subarray(row * columns, (row + 1) * columns));
}
