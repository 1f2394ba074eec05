/**
 * Unit tests for the heterogeneous graph assembler and its summary
 */

import { describe, it, expect } from 'vitest';
import { ShapeMismatchError } from '../../errors.js';
import type { TensorExport } from '../../types/export.js';
import { createLogger, type LogMeta } from '../../runtime/utils/logger.js';
import { assembleHeteroGraph } from '../hetero-assembler.js';
import { formatHeteroSummary } from '../summary.js';
import { matrixRow } from '../types.js';

const silent = createLogger('test', { level: 'silent' });

function tensor(partial: Partial<TensorExport>): TensorExport {
  return { kind: 'tensor', nodeFeatures: {}, nodeLabels: {}, edgeIndices: {}, edgeFeatures: {}, ...partial };
}

describe('assembleHeteroGraph', () => {
  it('builds node and edge groups from a small export', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { Person: [[0.1, 0.2], [0.3, 0.4]] },
      nodeLabels: { Person: ['Alice', 'Bob'] },
      edgeIndices: { 'Person,KNOWS,Person': [[0], [1]] },
    }), { logger: silent });

    expect(graph.nodeTypes).toEqual(['Person']);
    expect(graph.edgeTypes).toEqual([{ source: 'Person', relation: 'KNOWS', destination: 'Person' }]);

    const person = graph.node('Person');
    expect(person?.x.shape).toEqual([2, 2]);
    expect(person?.x.data).toBeInstanceOf(Float32Array);
    expect(person?.labels).toEqual(['Alice', 'Bob']);

    const knows = graph.edge('Person,KNOWS,Person');
    expect(knows?.edgeIndex.shape).toEqual([2, 1]);
    expect(Array.from(knows?.edgeIndex.data ?? [])).toEqual([0, 1]);
    expect(knows?.edgeAttr).toBeUndefined();

    expect(graph.summary()).toEqual({
      nodeTypes: [{ type: 'Person', numNodes: 2, numFeatures: 2, labels: ['Alice', 'Bob'] }],
      edgeTypes: [{ source: 'Person', relation: 'KNOWS', destination: 'Person', numEdges: 1, numFeatures: null }],
    });
  });

  it('groups a two-person export with one edge and no edge features', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { Person: [[1, 2], [3, 4]] },
      edgeIndices: { 'Person,knows,Person': [[0], [1]] },
    }), { logger: silent });

    expect(graph.summary()).toEqual({
      nodeTypes: [{ type: 'Person', numNodes: 2, numFeatures: 2 }],
      edgeTypes: [{ source: 'Person', relation: 'knows', destination: 'Person', numEdges: 1, numFeatures: null }],
    });
    expect(Array.from(graph.node('Person')?.x.data ?? [])).toEqual([1, 2, 3, 4]);
  });

  it('stores feature rows in row-major order', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { Paper: [[1, 2, 3], [4, 5, 6]] },
    }), { logger: silent });

    const paper = graph.node('Paper');
    expect(paper && matrixRow(paper.x, 1)).toEqual([4, 5, 6]);
  });

  it('attaches edge features when present', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { Author: [[1], [2]], Paper: [[3]] },
      edgeIndices: { 'Author,WROTE,Paper': [[0, 1], [0, 0]] },
      edgeFeatures: { 'Author,WROTE,Paper': [[0.5, 1], [0.25, 2]] },
    }), { logger: silent });

    const wrote = graph.edge({ source: 'Author', relation: 'WROTE', destination: 'Paper' });
    expect(wrote?.numEdges).toBe(2);
    expect(wrote?.edgeAttr?.shape).toEqual([2, 2]);
    expect(wrote?.edgeAttr && matrixRow(wrote.edgeAttr, 1)).toEqual([0.25, 2]);
    expect(graph.summary().edgeTypes[0].numFeatures).toBe(2);
  });

  it('treats empty edge features as absent', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1]] },
      edgeIndices: { 'A,R,A': [[0], [0]] },
      edgeFeatures: { 'A,R,A': [[]] },
    }), { logger: silent });

    expect(graph.edge('A,R,A')?.edgeAttr).toBeUndefined();
    expect(graph.edge('A,R,A')?.numFeatures).toBe(0);
  });

  it('accepts an empty edge group', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1]] },
      edgeIndices: { 'A,R,A': [[], []] },
    }), { logger: silent });

    expect(graph.edge('A,R,A')?.edgeIndex.shape).toEqual([2, 0]);
  });

  it('keeps its buffers when a caller writes to the groups it handed out', () => {
    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1, 2]] },
      edgeIndices: { 'A,R,A': [[0], [0]] },
      edgeFeatures: { 'A,R,A': [[5]] },
    }), { logger: silent });

    const first = graph.node('A');
    if (first) {
      first.x.data[0] = 99;
    }
    const edge = graph.edge('A,R,A');
    if (edge) {
      edge.edgeIndex.data[0] = 7;
      edge.edgeAttr?.data.fill(-1);
    }

    expect(Array.from(graph.node('A')?.x.data ?? [])).toEqual([1, 2]);
    expect(Array.from(graph.edge('A,R,A')?.edgeIndex.data ?? [])).toEqual([0, 0]);
    expect(Array.from(graph.edge('A,R,A')?.edgeAttr?.data ?? [])).toEqual([5]);
    expect(Object.isFrozen(graph.node('A')?.x.shape)).toBe(true);
  });

  it('rejects ragged feature rows', () => {
    expect(() => assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1, 2], [3]] },
    }), { logger: silent })).toThrow('Ragged node feature rows in A: row 1 has 1 values, expected 2');
  });

  it('rejects an edge index that does not have two rows', () => {
    expect(() => assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1]] },
      edgeIndices: { 'A,R,A': [[0]] },
    }), { logger: silent })).toThrow('Edge index for A,R,A must have 2 rows (source, destination), got 1');
  });

  it('rejects out-of-range and non-integer indices', () => {
    const outOfRange = () => assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1], [2]] },
      edgeIndices: { 'A,R,A': [[0], [2]] },
    }), { logger: silent });
    expect(outOfRange).toThrow(ShapeMismatchError);
    expect(outOfRange).toThrow('Edge 0 of A,R,A references A row 2, but A has 2 rows');

    expect(() => assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1], [2]] },
      edgeIndices: { 'A,R,A': [[0.5], [1]] },
    }), { logger: silent })).toThrow(ShapeMismatchError);
  });

  it('rejects edges to a node type without features', () => {
    expect(() => assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1]] },
      edgeIndices: { 'A,R,B': [[0], [0]] },
    }), { logger: silent })).toThrow('Edge 0 of A,R,B references B row 0, but B has 0 rows');
  });

  it('rejects edge features whose row count differs from the edge count', () => {
    expect(() => assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1], [2]] },
      edgeIndices: { 'A,R,A': [[0, 1], [1, 0]] },
      edgeFeatures: { 'A,R,A': [[1]] },
    }), { logger: silent })).toThrow('Edge features for A,R,A have 1 rows but there are 2 edges');
  });

  it('warns about label counts that do not match the node count', () => {
    const warnings: Array<{ message: string; meta?: LogMeta }> = [];
    const logger = {
      ...silent,
      warn: (message: string, meta?: LogMeta) => warnings.push({ message, meta }),
    };

    const graph = assembleHeteroGraph(tensor({
      nodeFeatures: { A: [[1], [2]] },
      nodeLabels: { A: ['only-one'], Ghost: ['x'] },
    }), { logger });

    expect(graph.node('A')?.numNodes).toBe(2);
    expect(warnings).toEqual([
      { message: 'Node label count differs from node count', meta: { type: 'A', labels: 1, nodes: 2 } },
      { message: 'Labels given for a node type without features, ignoring', meta: { type: 'Ghost' } },
    ]);
  });
});

describe('formatHeteroSummary', () => {
  it('renders node and edge types', () => {
    const text = formatHeteroSummary({
      nodeTypes: [{ type: 'Person', numNodes: 2, numFeatures: 2, labels: ['Alice', 'Bob'] }],
      edgeTypes: [
        { source: 'Person', relation: 'KNOWS', destination: 'Person', numEdges: 1, numFeatures: null },
        { source: 'Person', relation: 'RATED', destination: 'Movie', numEdges: 3, numFeatures: 1 },
      ],
    });

    expect(text.split('\n')).toEqual([
      '='.repeat(50),
      'Heterogeneous Graph Summary',
      '='.repeat(50),
      '',
      'Node Types:',
      '  - Person: 2 nodes, 2 features',
      '    Labels: Alice, Bob',
      '',
      'Edge Types:',
      '  - (Person) --[KNOWS]--> (Person): 1 edges',
      '  - (Person) --[RATED]--> (Movie): 3 edges, 1 features',
      '',
      '='.repeat(50),
    ]);
  });

  it('marks empty sections', () => {
    const lines = formatHeteroSummary({ nodeTypes: [], edgeTypes: [] }).split('\n');
    expect(lines[5]).toBe('  (none)');
    expect(lines[8]).toBe('  (none)');
  });
});
