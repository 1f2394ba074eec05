/**
 * Unit tests for PropertyGraphWriter
 *
 * Runs against the in-memory FakeGraphStore, which interprets the writer's
 * parameterized Cypher. Focus: two-phase ordering, identity resolution by
 * marker, and best-effort failure recording.
 */

import { describe, it, expect } from 'vitest';
import type { PropertyGraphExport } from '../../types/export.js';
import { createLogger, type LogMeta } from '../../runtime/utils/logger.js';
import { FakeGraphStore } from '../../__tests__/fake-graph-store.js';
import { PropertyGraphWriter, type WriteProgressEvent } from '../property-graph-writer.js';

const silent = createLogger('test', { level: 'silent' });

function graph(partial: Partial<PropertyGraphExport>): PropertyGraphExport {
  return { kind: 'property-graph', nodes: [], relationships: [], ...partial };
}

describe('PropertyGraphWriter', () => {
  it('creates a single labelled node carrying its identity marker', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    const outcome = await writer.write(store, graph({
      nodes: [{ id: 1, labels: ['Person'], properties: { label: 'Alice' } }],
    }));

    expect(outcome).toEqual({
      nodesAttempted: 1,
      nodesCreated: 1,
      relationshipsAttempted: 0,
      relationshipsCreated: 0,
      identityMarkersRemoved: 0,
      failures: [],
    });
    expect(store.nodes).toEqual([
      { labels: ['Person'], properties: { label: 'Alice', _exportId: 1 } },
    ]);
  });

  it('creates every node before any relationship', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    // The relationship references a node that comes after it in input order
    const outcome = await writer.write(store, graph({
      nodes: [
        { id: 'a', labels: ['Person'], properties: {} },
        { id: 'b', labels: ['Company', 'Org'], properties: { name: 'Acme' } },
      ],
      relationships: [
        { type: 'WORKS_AT', startNodeId: 'a', endNodeId: 'b', properties: { since: 2020 } },
      ],
    }));

    expect(outcome.nodesCreated).toBe(2);
    expect(outcome.relationshipsCreated).toBe(1);
    expect(store.relationships).toEqual([
      { type: 'WORKS_AT', start: 0, end: 1, properties: { since: 2020 } },
    ]);

    const firstRelationshipQuery = store.queries.findIndex(q => q.query.startsWith('OPTIONAL MATCH'));
    const lastNodeQuery = store.queries.map(q => q.query.startsWith('CREATE (n')).lastIndexOf(true);
    expect(lastNodeQuery).toBeLessThan(firstRelationshipQuery);
  });

  it('records a relationship with an unknown endpoint and keeps going', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    const outcome = await writer.write(store, graph({
      nodes: [
        { id: 1, labels: ['A'], properties: {} },
        { id: 2, labels: ['A'], properties: {} },
      ],
      relationships: [
        { type: 'LINKS', startNodeId: 1, endNodeId: 99, properties: {} },
        { type: 'LINKS', startNodeId: 98, endNodeId: 99, properties: {} },
        { type: 'LINKS', startNodeId: 1, endNodeId: 2, properties: {} },
      ],
    }));

    expect(outcome.relationshipsAttempted).toBe(3);
    expect(outcome.relationshipsCreated).toBe(1);
    expect(outcome.failures).toEqual([
      { entity: 'relationship', index: 0, type: 'LINKS', startNodeId: 1, endNodeId: 99, reason: 'end node not found' },
      { entity: 'relationship', index: 1, type: 'LINKS', startNodeId: 98, endNodeId: 99, reason: 'start and end nodes not found' },
    ]);
    expect(store.relationships).toHaveLength(1);
  });

  it('fails a relationship whose endpoint was omitted', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    const outcome = await writer.write(store, graph({
      nodes: [{ id: 1, labels: ['A'], properties: {} }],
      relationships: [{ type: 'LINKS', startNodeId: null, endNodeId: 1, properties: {} }],
    }));

    expect(outcome.failures).toEqual([
      { entity: 'relationship', index: 0, type: 'LINKS', startNodeId: null, endNodeId: 1, reason: 'start node not found' },
    ]);
  });

  it('does not match a string id against a numeric one', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    const outcome = await writer.write(store, graph({
      nodes: [
        { id: '1', labels: ['A'], properties: {} },
        { id: 2, labels: ['A'], properties: {} },
      ],
      relationships: [{ type: 'LINKS', startNodeId: 1, endNodeId: 2, properties: {} }],
    }));

    expect(outcome.relationshipsCreated).toBe(0);
    expect(outcome.failures[0]).toMatchObject({ reason: 'start node not found' });
  });

  it('records a failed node and still creates the rest', async () => {
    const store = new FakeGraphStore();
    store.failWhen = query => (query.includes('`Broken`') ? new Error('constraint violated') : undefined);
    const writer = new PropertyGraphWriter({ logger: silent });

    const outcome = await writer.write(store, graph({
      nodes: [
        { id: 1, labels: ['Broken'], properties: {} },
        { id: 2, labels: ['Fine'], properties: {} },
      ],
    }));

    expect(outcome.nodesAttempted).toBe(2);
    expect(outcome.nodesCreated).toBe(1);
    expect(outcome.failures).toEqual([
      { entity: 'node', externalId: 1, labels: ['Broken'], reason: 'constraint violated' },
    ]);
    expect(store.nodes.map(node => node.labels)).toEqual([['Fine']]);
  });

  it('refuses a node that already uses the marker property', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    const outcome = await writer.write(store, graph({
      nodes: [{ id: 1, labels: ['A'], properties: { _exportId: 'mine' } }],
    }));

    expect(outcome.nodesCreated).toBe(0);
    expect(outcome.failures[0]).toMatchObject({
      entity: 'node',
      reason: 'Node already declares the identity property "_exportId"',
    });
    expect(store.nodes).toEqual([]);
  });

  it('applies the configured defaults and identity property', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({
      logger: silent,
      identityProperty: 'sourceId',
      defaultLabel: 'Thing',
      defaultRelationshipType: 'LINKED',
    });

    await writer.write(store, graph({
      nodes: [
        { id: 'x', labels: [], properties: {} },
        { id: 'y', labels: [], properties: {} },
      ],
      relationships: [{ type: '', startNodeId: 'x', endNodeId: 'y', properties: {} }],
    }));

    expect(store.nodes).toEqual([
      { labels: ['Thing'], properties: { sourceId: 'x' } },
      { labels: ['Thing'], properties: { sourceId: 'y' } },
    ]);
    expect(store.relationships).toEqual([{ type: 'LINKED', start: 0, end: 1, properties: {} }]);
  });

  it('removes the identity markers when asked to', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent, removeIdentityProperty: true });

    const outcome = await writer.write(store, graph({
      nodes: [
        { id: 1, labels: ['A'], properties: { name: 'one' } },
        { id: 2, labels: ['A'], properties: {} },
      ],
      relationships: [{ type: 'R', startNodeId: 1, endNodeId: 2, properties: {} }],
    }));

    expect(outcome.relationshipsCreated).toBe(1);
    expect(outcome.identityMarkersRemoved).toBe(2);
    expect(store.nodes.map(node => node.properties)).toEqual([{ name: 'one' }, {}]);
  });

  it('keeps the counts and logs the reason when marker removal fails', async () => {
    const errors: Array<{ message: string; meta?: LogMeta }> = [];
    const logger = {
      ...silent,
      error: (message: string, meta?: LogMeta) => errors.push({ message, meta }),
    };
    const store = new FakeGraphStore();
    store.failWhen = query => (query.includes(' REMOVE ') ? new Error('lock timeout') : undefined);
    const writer = new PropertyGraphWriter({ logger, removeIdentityProperty: true });

    const outcome = await writer.write(store, graph({
      nodes: [
        { id: 1, labels: ['A'], properties: {} },
        { id: 2, labels: ['A'], properties: {} },
      ],
      relationships: [{ type: 'R', startNodeId: 1, endNodeId: 2, properties: {} }],
    }));

    expect(outcome).toEqual({
      nodesAttempted: 2,
      nodesCreated: 2,
      relationshipsAttempted: 1,
      relationshipsCreated: 1,
      identityMarkersRemoved: 0,
      failures: [],
    });
    expect(errors).toEqual([
      { message: 'Failed to remove identity markers', meta: { property: '_exportId', reason: 'lock timeout' } },
    ]);
    expect(store.nodes.map(node => node.properties)).toEqual([{ _exportId: 1 }, { _exportId: 2 }]);
  });

  it('stores nested property values as JSON strings and drops nulls', async () => {
    const store = new FakeGraphStore();
    const writer = new PropertyGraphWriter({ logger: silent });

    await writer.write(store, graph({
      nodes: [{ id: 1, labels: ['A'], properties: { meta: { a: 1 }, mixed: [1, 'x'], empty: null, tags: ['t'] } }],
    }));

    expect(store.nodes[0].properties).toEqual({
      meta: '{"a":1}',
      mixed: '[1,"x"]',
      tags: ['t'],
      _exportId: 1,
    });
  });

  it('reports progress for created and failed entities', async () => {
    const store = new FakeGraphStore();
    const events: WriteProgressEvent[] = [];
    const writer = new PropertyGraphWriter({ logger: silent, onProgress: event => events.push(event) });

    await writer.write(store, graph({
      nodes: [{ id: 1, labels: ['Person'], properties: { label: 'Alice' } }],
      relationships: [{ type: 'KNOWS', startNodeId: 1, endNodeId: 2, properties: {} }],
    }));

    expect(events).toEqual([
      { status: 'created', entity: 'node', description: 'Person: Alice' },
      {
        status: 'failed',
        failure: { entity: 'relationship', index: 0, type: 'KNOWS', startNodeId: 1, endNodeId: 2, reason: 'end node not found' },
      },
    ]);
  });
});
