/**
 * MCP server command - read-only Cypher gateway over stdio
 *
 * stdout is the JSON-RPC stream: everything else goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../../src/config/loader.js';
import { createGatewayServer } from '../../src/gateway/mcp-server.js';
import { QueryGateway } from '../../src/gateway/query-gateway.js';
import { createLogger } from '../../src/runtime/utils/logger.js';
import { connectOrExit, connectionOverrides, type ConnectionFlags } from '../utils/connection.js';
import { VERSION } from '../version.js';

export interface McpServerOptions extends ConnectionFlags {
  config?: string;
}

export function printMcpServerHelp(): void {
  console.log(`
Usage: graphport mcp-server [options]

Serve the read-only graph query tools over MCP (stdio):
  get_graph_schema, get_graph_stats, sample_nodes, query_runner
and the cypher_agent_prompt prompt.

Options:
  --uri <uri>          Neo4j bolt URI (default: bolt://localhost:7687)
  --user <name>        Neo4j username (default: neo4j)
  --password <secret>  Neo4j password (default: password)
  --database <name>    Database to query (default: server default)
  --config <path>      Config file (default: ./graphport.yaml when present)
  -h, --help           Show this help

Example MCP client configuration:
  { "command": "graphport", "args": ["mcp-server", "--password", "secret"] }
`);
}

export function parseMcpServerOptions(args: string[]): McpServerOptions {
  const options: McpServerOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--uri':
        options.uri = args[++i];
        break;
      case '--user':
        options.user = args[++i];
        break;
      case '--password':
        options.password = args[++i];
        break;
      case '--database':
        options.database = args[++i];
        break;
      case '--config':
        options.config = args[++i];
        break;
      case '-h':
      case '--help':
        printMcpServerHelp();
        process.exit(0);
      default:
        throw new Error(`Unknown option for mcp-server: ${arg}`);
    }
  }

  return options;
}

export async function runMcpServer(options: McpServerOptions): Promise<void> {
  const logger = createLogger('McpServer');
  const config = await loadConfig({
    configPath: options.config,
    overrides: { neo4j: connectionOverrides(options) },
  });

  const client = await connectOrExit(config.neo4j, line => console.error(line));

  const gateway = new QueryGateway(client, {
    resultLimit: config.gateway.resultLimit,
    sampleLimit: config.gateway.sampleLimit,
    introspection: {
      labelLimit: config.gateway.schemaLabelLimit,
      sampleSize: config.gateway.schemaSampleSize,
      propertyLimit: config.gateway.schemaPropertyLimit,
    },
    logger: logger.child('gateway'),
  });

  const server = createGatewayServer(gateway, { version: VERSION, logger });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => client.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error: String(error) });
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await server.connect(new StdioServerTransport());
  logger.info('Graph query gateway running on stdio', { uri: client.uri });
}
