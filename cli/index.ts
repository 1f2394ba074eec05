#!/usr/bin/env node
/**
 * graphport CLI entry point.
 *
 * Load graph exports into Neo4j or into heterogeneous tensor graphs,
 * and serve a read-only Cypher gateway to agents over MCP.
 */

import process from 'process';
import {
  parseImportOptions,
  runImport,
  printImportHelp
} from './commands/import.js';
import {
  parseHeteroOptions,
  runHetero,
  printHeteroHelp
} from './commands/hetero.js';
import {
  parseMcpServerOptions,
  runMcpServer,
  printMcpServerHelp
} from './commands/mcp-server.js';
import { GraphportError } from '../src/errors.js';

import { VERSION } from './version.js';

function printRootHelp(): void {
  console.log(`graphport CLI v${VERSION}

Turn graph exports into a Neo4j property graph or a heterogeneous tensor
graph, and let agents query the result read-only.

Usage:
  graphport import <file> [options]    Load nodes + relationships into Neo4j
  graphport hetero <file> [options]    Assemble a tensor export and print its structure
  graphport mcp-server [options]       Serve the read-only query gateway (MCP, stdio)
  graphport help <command>             Show help for a command

Global options:
  -h, --help       Show this message
  -v, --version    Show CLI version

Examples:
  graphport import graph.json --password secret --clear
  graphport import --guide
  graphport hetero graph_tensor.json
  graphport mcp-server --password secret
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printRootHelp();
    return;
  }

  const [command, ...rest] = args;

  try {
    switch (command) {
      case '-h':
      case '--help':
        printRootHelp();
        return;

      case '-v':
      case '--version':
        console.log(VERSION);
        return;

      case 'help':
        switch (rest[0]) {
          case 'import':
            printImportHelp();
            break;
          case 'hetero':
            printHeteroHelp();
            break;
          case 'mcp-server':
            printMcpServerHelp();
            break;
          default:
            printRootHelp();
        }
        return;

      case 'import': {
        const options = parseImportOptions(rest);
        await runImport(options);
        return;
      }

      case 'hetero': {
        const options = parseHeteroOptions(rest);
        await runHetero(options);
        return;
      }

      case 'mcp-server': {
        const options = parseMcpServerOptions(rest);
        await runMcpServer(options);
        return;
      }

      default:
        console.error(`Unknown command "${command}".`);
        printRootHelp();
        process.exitCode = 1;
        return;
    }
  } catch (error: unknown) {
    if (error instanceof GraphportError) {
      console.error(`❌ ${error.name}: ${error.message}`);
    } else {
      console.error('❌ Error:', error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Unexpected error:', error instanceof Error ? error.stack || error.message : error);
  process.exitCode = 1;
});
