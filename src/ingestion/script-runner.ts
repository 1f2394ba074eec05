/**
 * Script Runner
 *
 * Alternate import mode for producers that emit ready-made Cypher instead of
 * structured records. Each statement runs on its own; a failing statement is
 * recorded and the next one runs.
 */

import { MalformedExportError, describeError } from '../errors.js';
import type { PropertyGraphExport } from '../types/export.js';
import type { CypherRunner } from '../runtime/client/neo4j-client.js';
import { createLogger, type Logger } from '../runtime/utils/logger.js';
import { elapsedMs } from '../runtime/utils/timestamp.js';
import { previewStatement, type ScriptOutcome, type StatementFailure } from './outcome.js';
import { splitStatements } from './statement-splitter.js';

export interface ScriptRunnerOptions {
  logger?: Logger;
}

/**
 * The export's script, or MalformedExportError when it has none.
 * Check this before touching the store.
 */
export function requireScript(graph: PropertyGraphExport): string {
  if (!graph.cypherScript || graph.cypherScript.trim().length === 0) {
    throw new MalformedExportError('Export has no cypherScript to execute');
  }
  return graph.cypherScript;
}

export class ScriptRunner {
  private readonly logger: Logger;

  constructor(options: ScriptRunnerOptions = {}) {
    this.logger = options.logger ?? createLogger('ScriptRunner');
  }

  /**
   * Run the export's `cypherScript`.
   * @throws MalformedExportError when the export carries no script (nothing is executed)
   */
  async runExport(runner: CypherRunner, graph: PropertyGraphExport): Promise<ScriptOutcome> {
    return this.run(runner, requireScript(graph));
  }

  async run(runner: CypherRunner, script: string): Promise<ScriptOutcome> {
    const started = performance.now();
    const statements = splitStatements(script);
    const failures: StatementFailure[] = [];
    let executed = 0;

    this.logger.info('Executing Cypher script', {
      characters: script.length,
      statements: statements.length,
    });

    for (const [index, statement] of statements.entries()) {
      try {
        await runner.run(statement);
        executed++;
      } catch (error) {
        const failure: StatementFailure = { index, statement, reason: describeError(error) };
        failures.push(failure);
        this.logger.warn('Statement failed', {
          index,
          statement: previewStatement(statement),
          reason: failure.reason,
        });
      }
    }

    this.logger.info('Script finished', {
      executed,
      failed: failures.length,
      durationMs: elapsedMs(started),
    });

    return {
      statementsAttempted: statements.length,
      statementsExecuted: executed,
      failures,
    };
  }
}
