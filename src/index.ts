/**
 * graphport - library entry point
 */

export * from './types/export.js';
export * from './errors.js';

export {
  parseExportDocument,
  parsePropertyGraphExport,
  parseTensorExport,
  loadExportDocument,
  loadPropertyGraphExport,
  loadTensorExport,
  parseTripletKey,
  formatTripletKey,
} from './ingestion/export-parser.js';
export { IdentityResolver, IdentityCollisionError, DEFAULT_IDENTITY_PROPERTY } from './ingestion/identity.js';
export {
  PropertyGraphWriter,
  type PropertyGraphWriterOptions,
  type WriteProgressEvent,
} from './ingestion/property-graph-writer.js';
export { ScriptRunner, requireScript } from './ingestion/script-runner.js';
export { splitStatements } from './ingestion/statement-splitter.js';
export * from './ingestion/outcome.js';

export { HeteroGraph, assembleHeteroGraph } from './hetero/hetero-assembler.js';
export { formatHeteroSummary } from './hetero/summary.js';
export * from './hetero/types.js';

export { introspectSchema, type SchemaSummary, type IntrospectionOptions } from './graph/schema-introspector.js';
export { getGraphCounts, getGraphStats, sampleNodes, clearGraph, type GraphCounts, type GraphStats } from './graph/stats.js';

export {
  classifyQuery,
  isReadOnlyQuery,
  applyResultBound,
  MUTATION_KEYWORDS,
  DEFAULT_RESULT_LIMIT,
  type QueryClassification,
} from './gateway/query-safety.js';
export {
  QueryGateway,
  REFUSAL_MESSAGE,
  NO_RESULTS_MESSAGE,
  type SessionProvider,
  type QueryGatewayOptions,
} from './gateway/query-gateway.js';
export { createGatewayServer } from './gateway/mcp-server.js';
export { renderCypherAgentPrompt } from './gateway/agent-prompt.js';
export { generateGraphQueryTools, generateGraphQueryToolHandlers } from './tools/graph-query-tools.js';

export {
  Neo4jClient,
  type Neo4jConfig,
  type CypherRunner,
  type CypherRecord,
  type CypherResult,
  type SessionOptions,
} from './runtime/client/neo4j-client.js';
export { loadConfig, type LoadConfigOptions } from './config/loader.js';
export { type GraphportConfig, DEFAULT_CONFIG } from './config/schema.js';
export { createLogger, type Logger, type LogLevel } from './runtime/utils/logger.js';
