/**
 * Connection helpers shared by commands
 */

import { ConnectionError } from '../../src/errors.js';
import { Neo4jClient, type Neo4jConfig } from '../../src/runtime/client/neo4j-client.js';

export interface ConnectionFlags {
  uri?: string;
  user?: string;
  password?: string;
  database?: string;
}

export function connectionOverrides(flags: ConnectionFlags): Partial<Neo4jConfig> {
  const overrides: Partial<Neo4jConfig> = {};
  if (flags.uri) overrides.uri = flags.uri;
  if (flags.user) overrides.username = flags.user;
  if (flags.password) overrides.password = flags.password;
  if (flags.database) overrides.database = flags.database;
  return overrides;
}

/**
 * Connect, or print a diagnostic and terminate with status 1.
 * `print` must write to stderr when stdout is a protocol stream.
 */
export async function connectOrExit(
  config: Neo4jConfig,
  print: (line: string) => void = line => console.log(line)
): Promise<Neo4jClient> {
  try {
    return await Neo4jClient.connect(config);
  } catch (error) {
    if (error instanceof ConnectionError) {
      print(`❌ ${error.message}`);
      print('\nTroubleshooting:');
      error.hints.forEach((hint, index) => print(`  ${index + 1}. ${hint}`));
      process.exit(1);
    }
    throw error;
  }
}
