/**
 * Neo4j Client
 *
 * Thin wrapper around neo4j-driver. The client is created by the caller and
 * passed explicitly; there is no shared driver instance.
 *
 * Every unit of work runs in one scoped session obtained through
 * `withSession()`, which is closed on every exit path.
 */

import neo4j, { type Driver, type SessionMode } from 'neo4j-driver';
import { ConnectionError, describeError } from '../../errors.js';
import { toPlainValue } from './values.js';

// ============================================
// Types
// ============================================

export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  /** Target database (server default when omitted) */
  database?: string;
}

export type QueryParams = Record<string, unknown>;

/**
 * A result row, with driver types already converted to plain JS values
 */
export interface CypherRecord {
  keys: string[];
  get(key: string): unknown;
  toObject(): Record<string, unknown>;
}

export interface CypherResult {
  records: CypherRecord[];
}

/**
 * Anything that can run a Cypher query: a session-bound runner, or a fake in tests
 */
export interface CypherRunner {
  run(query: string, params?: QueryParams): Promise<CypherResult>;
}

export type AccessMode = 'READ' | 'WRITE';

export interface SessionOptions {
  /**
   * READ opens a read-access session: every query runs as an auto-commit
   * transaction in read mode, which the server refuses to write from.
   * Failures are not retried in either mode.
   */
  accessMode?: AccessMode;
}

export const CONNECTION_HINTS = [
  'Is Neo4j running? (check Neo4j Desktop, the service, or your Docker container)',
  'Is the bolt URI correct? (default: bolt://localhost:7687)',
  'Are the username and password correct?',
];

// ============================================
// Record conversion
// ============================================

interface DriverRecordLike {
  keys: PropertyKey[];
  toObject(): object;
}

// ============================================
// Driver surface
// ============================================

/**
 * The parts of a neo4j-driver Session the client uses
 */
export interface DriverSessionLike {
  run(query: string, params?: QueryParams): PromiseLike<{ records: DriverRecordLike[] }>;
  close(): Promise<void>;
}

/**
 * The parts of a neo4j-driver Driver the client uses (a real Driver satisfies it)
 */
export interface DriverLike {
  session(config: { database?: string; defaultAccessMode?: SessionMode }): DriverSessionLike;
  verifyConnectivity(config?: { database?: string }): Promise<unknown>;
  close(): Promise<void>;
}

export function toCypherRecord(record: DriverRecordLike): CypherRecord {
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record.toObject())) {
    values[key] = toPlainValue(value);
  }

  return {
    keys: record.keys.map(String),
    get: (key: string) => {
      if (!(key in values)) {
        throw new Error(`Record has no field "${key}" (fields: ${Object.keys(values).join(', ')})`);
      }
      return values[key];
    },
    toObject: () => ({ ...values }),
  };
}

// Auto-commit only: managed transactions (executeRead / executeWrite) would
// retry failed queries on their own
function sessionRunner(session: DriverSessionLike): CypherRunner {
  return {
    async run(query: string, params: QueryParams = {}): Promise<CypherResult> {
      const result = await session.run(query, params);
      return { records: result.records.map(toCypherRecord) };
    },
  };
}

// ============================================
// Client
// ============================================

export class Neo4jClient {
  private readonly driver: DriverLike;

  constructor(private readonly config: Neo4jConfig, driver?: DriverLike) {
    this.driver = driver ?? Neo4jClient.createDriver(config);
  }

  get uri(): string {
    return this.config.uri;
  }

  /**
   * Create a client and check that the server accepts the credentials.
   * @throws ConnectionError (the driver is closed before throwing)
   */
  static async connect(config: Neo4jConfig): Promise<Neo4jClient> {
    const client = new Neo4jClient(config);
    try {
      await client.verifyConnectivity();
    } catch (error) {
      await client.close();
      throw error;
    }
    return client;
  }

  private static createDriver(config: Neo4jConfig): Driver {
    try {
      return neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password));
    } catch (error) {
      throw new ConnectionError(
        `Invalid Neo4j connection settings for ${config.uri}: ${describeError(error)}`,
        config.uri,
        CONNECTION_HINTS
      );
    }
  }

  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity({ database: this.config.database });
    } catch (error) {
      throw new ConnectionError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${describeError(error)}`,
        this.config.uri,
        CONNECTION_HINTS
      );
    }
  }

  /**
   * Run `work` inside one session. The session is closed whether `work`
   * resolves or throws.
   */
  async withSession<T>(
    work: (runner: CypherRunner) => Promise<T>,
    options: SessionOptions = {}
  ): Promise<T> {
    const accessMode = options.accessMode ?? 'WRITE';
    const session = this.driver.session({
      database: this.config.database,
      defaultAccessMode: accessMode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
    });

    try {
      return await work(sessionRunner(session));
    } finally {
      await session.close();
    }
  }

  /**
   * Run a single query in its own session
   */
  async run(query: string, params: QueryParams = {}, options: SessionOptions = {}): Promise<CypherResult> {
    return this.withSession(runner => runner.run(query, params), options);
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
