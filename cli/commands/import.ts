/**
 * Import command - load a property-graph export into Neo4j
 *
 * Usage:
 *   graphport import graph_export.json
 *   graphport import graph_export.json --uri bolt://localhost:7687 --user neo4j --password secret
 *   graphport import graph_export.json --clear
 *   graphport import graph_export.json --use-script
 */

import { existsSync } from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/loader.js';
import { clearGraph, getGraphStats } from '../../src/graph/stats.js';
import { loadPropertyGraphExport } from '../../src/ingestion/export-parser.js';
import { PropertyGraphWriter, type WriteProgressEvent } from '../../src/ingestion/property-graph-writer.js';
import { formatFailure } from '../../src/ingestion/outcome.js';
import { ScriptRunner, requireScript } from '../../src/ingestion/script-runner.js';
import { connectOrExit, connectionOverrides } from '../utils/connection.js';
import { printQuickStart, printSampleQueries } from '../utils/guides.js';
import { formatImportOutcome, formatScriptOutcome, formatStats } from '../utils/report.js';

export interface ImportOptions {
  file?: string;
  uri?: string;
  user?: string;
  password?: string;
  database?: string;
  config?: string;
  clear?: boolean;
  useScript?: boolean;
  removeIdentity?: boolean;
  guide?: boolean;
  queries?: boolean;
  verbose?: boolean;
}

export function printImportHelp(): void {
  console.log(`
Usage: graphport import <export.json> [options]

Load a property-graph export (nodes + relationships) into Neo4j.

Options:
  --uri <uri>          Neo4j bolt URI (default: bolt://localhost:7687)
  --user <name>        Neo4j username (default: neo4j)
  --password <secret>  Neo4j password (default: password)
  --database <name>    Target database (default: server default)
  --config <path>      Config file (default: ./graphport.yaml when present)
  --clear              Delete all existing data before loading
  --use-script         Execute the export's cypherScript instead of node-by-node loading
  --remove-identity    Remove the import marker property from nodes afterwards
  --verbose            Print every created node and relationship
  --guide              Show the quick start guide
  --queries            Show sample Cypher queries
  -h, --help           Show this help

Examples:
  graphport import graph.json
  graphport import graph.json --password mypassword
  graphport import graph.json --clear --uri bolt://localhost:7687
  graphport import --guide
`);
}

export function parseImportOptions(args: string[]): ImportOptions {
  const options: ImportOptions = {};

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
      case '--clear':
        options.clear = true;
        break;
      case '--use-script':
        options.useScript = true;
        break;
      case '--remove-identity':
        options.removeIdentity = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--guide':
        options.guide = true;
        break;
      case '--queries':
        options.queries = true;
        break;
      case '-h':
      case '--help':
        printImportHelp();
        process.exit(0);
      default:
        if (!arg.startsWith('-') && options.file === undefined) {
          options.file = arg;
        } else {
          throw new Error(`Unknown option for import: ${arg}`);
        }
    }
  }

  return options;
}

function printProgress(event: WriteProgressEvent): void {
  if (event.status === 'created') {
    console.log(`  ✓ Created ${event.description}`);
  } else {
    console.log(`  ✗ ${formatFailure(event.failure)}`);
  }
}

export async function runImport(options: ImportOptions): Promise<void> {
  if (options.guide) {
    printQuickStart();
    return;
  }
  if (options.queries) {
    printSampleQueries();
    return;
  }

  if (!options.file) {
    printImportHelp();
    console.log('❌ Error: Please provide an export file to load');
    console.log('   Run with --guide for setup instructions');
    return;
  }

  const filePath = path.resolve(options.file);
  if (!existsSync(filePath)) {
    printImportHelp();
    console.log(`❌ Error: Export file not found: ${filePath}`);
    return;
  }

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      neo4j: connectionOverrides(options),
      import: options.removeIdentity ? { removeIdentityProperty: true } : {},
    },
  });

  // Parse (and check the script) before anything touches the store
  const graph = await loadPropertyGraphExport(filePath);
  if (options.useScript) {
    requireScript(graph);
  }

  console.log('='.repeat(60));
  console.log('🔷 Graph Export → Neo4j Loader');
  console.log('='.repeat(60));
  console.log(`\n📊 Export contains: ${graph.nodes.length} nodes, ${graph.relationships.length} relationships`);

  const client = await connectOrExit(config.neo4j);
  console.log(`✅ Connected to Neo4j at ${client.uri}`);

  try {
    await client.withSession(async runner => {
      const before = await getGraphStats(runner);
      console.log(`\n📊 Current database: ${before.nodeCount} nodes, ${before.edgeCount} relationships`);
      if (before.labels.length > 0) {
        console.log(`   Labels: ${before.labels.join(', ')}`);
      }

      if (options.clear) {
        await clearGraph(runner);
        console.log('🗑️  Cleared all existing data from database');
      }

      if (options.useScript) {
        console.log('\n📜 Executing Cypher script...');
        const outcome = await new ScriptRunner().runExport(runner, graph);
        console.log(formatScriptOutcome(outcome));
      } else {
        console.log('\n📦 Creating nodes, then 🔗 relationships...');
        const writer = new PropertyGraphWriter({
          ...config.import,
          onProgress: options.verbose ? printProgress : undefined,
        });
        const outcome = await writer.write(runner, graph);
        console.log(formatImportOutcome(outcome));
      }

      const after = await getGraphStats(runner);
      console.log('\n' + '='.repeat(60));
      console.log('✅ Loading Complete!');
      console.log('='.repeat(60));
      console.log('\n📊 Final database stats:');
      console.log(formatStats(after));
    });

    console.log('\n🌐 Open Neo4j Browser: http://localhost:7474');
    console.log('   Try: MATCH (n) RETURN n');
  } finally {
    await client.close();
  }
}
