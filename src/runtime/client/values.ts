/**
 * Value conversion at the Neo4j boundary
 *
 * Outgoing (export -> store): JSON property values are coerced into what Neo4j
 * accepts as a property: integers become driver Integers, homogeneous lists
 * of primitives stay lists, maps and mixed lists are stored as JSON strings,
 * and null is dropped.
 *
 * Incoming (store -> caller): driver types are turned into plain JS values.
 */

import neo4j, { isInt, type Integer } from 'neo4j-driver';
import type { PropertyMap, PropertyValue } from '../../types/export.js';

export type StoreScalar = string | number | boolean | Integer;
export type StoreValue = StoreScalar | StoreScalar[];

// ============================================
// Outgoing
// ============================================

function toStoreNumber(value: number): number | Integer {
  return Number.isSafeInteger(value) ? neo4j.int(value) : value;
}

function toStoreList(values: PropertyValue[]): StoreScalar[] | string {
  if (values.every((v): v is string => typeof v === 'string')) {
    return values;
  }
  if (values.every((v): v is boolean => typeof v === 'boolean')) {
    return values;
  }
  if (values.every((v): v is number => typeof v === 'number')) {
    return values.every(v => Number.isSafeInteger(v))
      ? values.map(v => neo4j.int(v))
      : values;
  }
  // Neo4j lists must be homogeneous
  return JSON.stringify(values);
}

/**
 * Coerce one property value. Returns undefined for values that are not stored (null).
 */
export function toStoreValue(value: PropertyValue): StoreValue | undefined {
  if (value === null) {
    return undefined;
  }
  if (typeof value === 'number') {
    return toStoreNumber(value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return toStoreList(value);
  }
  return JSON.stringify(value);
}

export function toStoreProperties(properties: PropertyMap): Record<string, StoreValue> {
  const result: Record<string, StoreValue> = {};
  for (const [key, value] of Object.entries(properties)) {
    const converted = toStoreValue(value);
    if (converted !== undefined) {
      result[key] = converted;
    }
  }
  return result;
}

// ============================================
// Incoming
// ============================================

const types = neo4j.types;

function isTemporalOrSpatial(value: object): boolean {
  return (
    value instanceof types.Point ||
    value instanceof types.Duration ||
    value instanceof types.Date ||
    value instanceof types.DateTime ||
    value instanceof types.LocalDateTime ||
    value instanceof types.LocalTime ||
    value instanceof types.Time
  );
}

/**
 * Convert a value read from Neo4j to plain JS.
 * - Integer -> number (string when outside the safe range)
 * - Node / Relationship -> its property map
 * - Path -> list of node property maps
 * - temporal / spatial -> ISO-like string
 */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (typeof value !== 'object') {
    return value;
  }
  if (
    value instanceof types.Node ||
    value instanceof types.Relationship ||
    value instanceof types.UnboundRelationship
  ) {
    return toPlainObject(value.properties);
  }
  if (value instanceof types.Path) {
    return [value.start, ...value.segments.map(segment => segment.end)].map(node =>
      toPlainObject(node.properties)
    );
  }
  if (isTemporalOrSpatial(value)) {
    return String(value);
  }
  return toPlainObject(value);
}

export function toPlainObject(value: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = toPlainValue(entry);
  }
  return result;
}
