/**
 * Hetero command - assemble a tensor export into a heterogeneous graph
 *
 * Usage:
 *   graphport hetero graph_tensor.json
 *   graphport hetero graph_tensor.json --json
 */

import { existsSync } from 'fs';
import path from 'path';
import { assembleHeteroGraph } from '../../src/hetero/hetero-assembler.js';
import { formatHeteroSummary } from '../../src/hetero/summary.js';
import { loadTensorExport } from '../../src/ingestion/export-parser.js';

export interface HeteroOptions {
  file?: string;
  json?: boolean;
}

export function printHeteroHelp(): void {
  console.log(`
Usage: graphport hetero <export.json> [options]

Assemble a tensor export (nodeFeatures, nodeLabels, edgeIndices, edgeFeatures)
into a heterogeneous graph keyed by (source, relation, destination) and print
its structure.

Options:
  --json         Print the summary as JSON
  -h, --help     Show this help
`);
}

export function parseHeteroOptions(args: string[]): HeteroOptions {
  const options: HeteroOptions = {};

  for (const arg of args) {
    switch (arg) {
      case '--json':
        options.json = true;
        break;
      case '-h':
      case '--help':
        printHeteroHelp();
        process.exit(0);
      default:
        if (!arg.startsWith('-') && options.file === undefined) {
          options.file = arg;
        } else {
          throw new Error(`Unknown option for hetero: ${arg}`);
        }
    }
  }

  return options;
}

export async function runHetero(options: HeteroOptions): Promise<void> {
  if (!options.file) {
    printHeteroHelp();
    console.log('❌ Error: Please provide a tensor export file');
    return;
  }

  const filePath = path.resolve(options.file);
  if (!existsSync(filePath)) {
    printHeteroHelp();
    console.log(`❌ Error: Export file not found: ${filePath}`);
    return;
  }

  if (!options.json) {
    console.log(`Loading graph from: ${filePath}`);
  }
  const graph = assembleHeteroGraph(await loadTensorExport(filePath));
  const summary = graph.summary();

  console.log(options.json ? JSON.stringify(summary, null, 2) : formatHeteroSummary(summary));
}
