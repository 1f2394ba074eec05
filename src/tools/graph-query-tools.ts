/**
 * Graph Query Tools
 *
 * Tools for an agent to explore the property graph:
 * - get_graph_schema: labels, relationship types, property keys
 * - get_graph_stats: node / relationship counts
 * - sample_nodes: a few nodes of a label, to see real values
 * - query_runner: read-only Cypher (mutations refused, results bounded)
 *
 * Handlers return text. Store errors are thrown unchanged; the MCP layer
 * turns them into error results the agent can read.
 */

import { z } from 'zod';
import type { QueryGateway } from '../gateway/query-gateway.js';

// ============================================
// Types
// ============================================

export interface GraphToolDefinition {
  name: string;
  description: string;
  /** zod raw shape of the tool arguments */
  inputSchema: z.ZodRawShape;
}

export type GraphToolHandler = (params: Record<string, unknown>) => Promise<string>;

export const NAME_PROPERTY_RULE =
  "Use `label` property for node names (n.label CONTAINS '...') when present.";

// ============================================
// Tool: get_graph_schema
// ============================================

export function generateGetGraphSchemaTool(): GraphToolDefinition {
  return {
    name: 'get_graph_schema',
    description:
      'Returns graph schema info: node labels, relationship types, property keys, ' +
      'and the most common properties of each label (sampled).',
    inputSchema: {},
  };
}

export function generateGetGraphSchemaHandler(gateway: QueryGateway): GraphToolHandler {
  return async () => {
    const schema = await gateway.getSchema();
    return JSON.stringify({ ...schema, namePropertyRule: NAME_PROPERTY_RULE }, null, 2);
  };
}

// ============================================
// Tool: get_graph_stats
// ============================================

export function generateGetGraphStatsTool(): GraphToolDefinition {
  return {
    name: 'get_graph_stats',
    description: 'Returns node and relationship counts.',
    inputSchema: {},
  };
}

export function generateGetGraphStatsHandler(gateway: QueryGateway): GraphToolHandler {
  return async () => JSON.stringify(await gateway.getCounts(), null, 2);
}

// ============================================
// Tool: sample_nodes
// ============================================

const sampleNodesShape = {
  label: z.string().min(1).describe('Node label to sample'),
  limit: z.number().int().min(1).max(100).optional().describe('Number of nodes (default: 5)'),
};

export function generateSampleNodesTool(): GraphToolDefinition {
  return {
    name: 'sample_nodes',
    description: 'Returns sample nodes (property maps) for a given label.',
    inputSchema: sampleNodesShape,
  };
}

export function generateSampleNodesHandler(gateway: QueryGateway): GraphToolHandler {
  const schema = z.object(sampleNodesShape);
  return async (params) => {
    const { label, limit } = schema.parse(params);
    return JSON.stringify(await gateway.sampleNodes(label, limit), null, 2);
  };
}

// ============================================
// Tool: query_runner
// ============================================

const queryRunnerShape = {
  cypher_q: z.string().min(1).describe('Read-only Cypher query'),
};

export function generateQueryRunnerTool(): GraphToolDefinition {
  return {
    name: 'query_runner',
    description:
      'Runs READ-ONLY Cypher and returns results, one JSON object per row. ' +
      'Queries containing CREATE, MERGE, DELETE, SET, DROP, REMOVE, CALL dbms or LOAD CSV are refused. ' +
      'A LIMIT 25 is appended when the query has no LIMIT.',
    inputSchema: queryRunnerShape,
  };
}

export function generateQueryRunnerHandler(gateway: QueryGateway): GraphToolHandler {
  const schema = z.object(queryRunnerShape);
  return async (params) => {
    const { cypher_q } = schema.parse(params);
    return gateway.runReadQuery(cypher_q);
  };
}

// ============================================
// Export all tools
// ============================================

export function generateGraphQueryTools(): GraphToolDefinition[] {
  return [
    generateGetGraphSchemaTool(),
    generateGetGraphStatsTool(),
    generateSampleNodesTool(),
    generateQueryRunnerTool(),
  ];
}

export function generateGraphQueryToolHandlers(gateway: QueryGateway): Record<string, GraphToolHandler> {
  return {
    get_graph_schema: generateGetGraphSchemaHandler(gateway),
    get_graph_stats: generateGetGraphStatsHandler(gateway),
    sample_nodes: generateSampleNodesHandler(gateway),
    query_runner: generateQueryRunnerHandler(gateway),
  };
}
