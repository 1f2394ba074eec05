/**
 * Import outcomes
 *
 * Imports are best-effort: one entity failing never aborts the run. Every
 * failure is recorded here with enough context (external ids, type) to patch
 * the store by hand afterwards.
 */

import type { ExternalId } from '../types/export.js';

export type EntityCreationFailure =
  | {
      entity: 'node';
      externalId: ExternalId;
      labels: string[];
      reason: string;
    }
  | {
      entity: 'relationship';
      /** Position in the export's relationships array */
      index: number;
      type: string;
      startNodeId: ExternalId | null;
      endNodeId: ExternalId | null;
      reason: string;
    };

export interface ImportOutcome {
  nodesAttempted: number;
  nodesCreated: number;
  relationshipsAttempted: number;
  relationshipsCreated: number;
  /** Nodes whose identity marker was removed after the import (0 when cleanup is off) */
  identityMarkersRemoved: number;
  failures: EntityCreationFailure[];
}

export interface StatementFailure {
  /** Position of the statement in the script */
  index: number;
  statement: string;
  reason: string;
}

export interface ScriptOutcome {
  statementsAttempted: number;
  statementsExecuted: number;
  failures: StatementFailure[];
}

/**
 * Running counters for one import
 */
export class ImportOutcomeAccumulator {
  private nodesAttempted = 0;
  private nodesCreated = 0;
  private relationshipsAttempted = 0;
  private relationshipsCreated = 0;
  private identityMarkersRemoved = 0;
  private readonly failures: EntityCreationFailure[] = [];

  nodeAttempted(): void {
    this.nodesAttempted++;
  }

  nodeCreated(): void {
    this.nodesCreated++;
  }

  relationshipAttempted(): void {
    this.relationshipsAttempted++;
  }

  relationshipCreated(): void {
    this.relationshipsCreated++;
  }

  markersRemoved(count: number): void {
    this.identityMarkersRemoved = count;
  }

  fail(failure: EntityCreationFailure): void {
    this.failures.push(failure);
  }

  toOutcome(): ImportOutcome {
    return {
      nodesAttempted: this.nodesAttempted,
      nodesCreated: this.nodesCreated,
      relationshipsAttempted: this.relationshipsAttempted,
      relationshipsCreated: this.relationshipsCreated,
      identityMarkersRemoved: this.identityMarkersRemoved,
      failures: [...this.failures],
    };
  }
}

/**
 * One line per failure, for CLI reports
 */
export function formatFailure(failure: EntityCreationFailure | StatementFailure): string {
  if ('entity' in failure) {
    if (failure.entity === 'node') {
      return `node ${JSON.stringify(failure.externalId)} (${failure.labels.join(':')}): ${failure.reason}`;
    }
    return (
      `relationship #${failure.index} [${failure.type}] ` +
      `${JSON.stringify(failure.startNodeId)} -> ${JSON.stringify(failure.endNodeId)}: ${failure.reason}`
    );
  }
  return `statement #${failure.index} "${previewStatement(failure.statement)}": ${failure.reason}`;
}

export function previewStatement(statement: string, max = 50): string {
  const flat = statement.replace(/\s+/g, ' ').trim();
  return flat.length > max ? flat.slice(0, max) + '...' : flat;
}
