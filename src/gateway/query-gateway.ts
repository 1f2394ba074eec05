/**
 * Query Gateway
 *
 * Read-only access to the property graph for an automated agent:
 * schema introspection, counts, node samples, and guarded execution of
 * free-form Cypher.
 *
 * Every call opens its own read session and releases it before returning.
 * Store errors are propagated as-is: the agent needs the server's message to
 * fix its next query.
 */

import type { CypherRecord, CypherRunner, SessionOptions } from '../runtime/client/neo4j-client.js';
import {
  introspectSchema,
  type IntrospectionOptions,
  type SchemaSummary,
} from '../graph/schema-introspector.js';
import {
  DEFAULT_SAMPLE_LIMIT,
  getGraphCounts,
  sampleNodes,
  type GraphCounts,
} from '../graph/stats.js';
import { createLogger, type Logger } from '../runtime/utils/logger.js';
import { applyResultBound, classifyQuery, DEFAULT_RESULT_LIMIT } from './query-safety.js';

export const REFUSAL_MESSAGE = 'Refused: only read-only Cypher is allowed.';
export const NO_RESULTS_MESSAGE = 'No results found.';

/**
 * Source of scoped sessions (Neo4jClient, or a fake in tests)
 */
export interface SessionProvider {
  withSession<T>(work: (runner: CypherRunner) => Promise<T>, options?: SessionOptions): Promise<T>;
}

export interface QueryGatewayOptions {
  /** LIMIT appended to unbounded queries (default: 25) */
  resultLimit?: number;
  /** Default number of nodes returned by sampleNodes (default: 5) */
  sampleLimit?: number;
  introspection?: IntrospectionOptions;
  logger?: Logger;
}

const READ: SessionOptions = { accessMode: 'READ' };

export class QueryGateway {
  private readonly resultLimit: number;
  private readonly sampleLimit: number;
  private readonly introspection: IntrospectionOptions;
  private readonly logger: Logger;

  constructor(
    private readonly sessions: SessionProvider,
    options: QueryGatewayOptions = {}
  ) {
    this.resultLimit = options.resultLimit ?? DEFAULT_RESULT_LIMIT;
    this.sampleLimit = options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT;
    this.introspection = options.introspection ?? {};
    this.logger = options.logger ?? createLogger('QueryGateway');
  }

  async getSchema(): Promise<SchemaSummary> {
    return this.sessions.withSession(runner => introspectSchema(runner, this.introspection), READ);
  }

  async getCounts(): Promise<GraphCounts> {
    return this.sessions.withSession(runner => getGraphCounts(runner), READ);
  }

  async sampleNodes(label: string, limit: number = this.sampleLimit): Promise<Record<string, unknown>[]> {
    return this.sessions.withSession(runner => sampleNodes(runner, label, limit), READ);
  }

  /**
   * Run a free-form query if it passes the read-only check.
   * @returns one JSON line per row, NO_RESULTS_MESSAGE, or REFUSAL_MESSAGE
   */
  async runReadQuery(query: string): Promise<string> {
    const classification = classifyQuery(query);
    if (!classification.safe) {
      this.logger.warn('Refused query', { keyword: classification.keyword });
      return REFUSAL_MESSAGE;
    }

    const bounded = applyResultBound(query, this.resultLimit);
    this.logger.debug('Running read query', { query: bounded });

    const result = await this.sessions.withSession(runner => runner.run(bounded), READ);
    return formatRecords(result.records);
  }
}

export function formatRecords(records: CypherRecord[]): string {
  if (records.length === 0) {
    return NO_RESULTS_MESSAGE;
  }
  return records.map(record => JSON.stringify(record.toObject())).join('\n');
}
