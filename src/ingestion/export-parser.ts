/**
 * Export Document Parser
 *
 * Parses a serialized graph export (JSON) into one of the two document shapes:
 * - property-graph: `nodes`, `relationships`, `cypherScript`
 * - tensor: `nodeFeatures`, `nodeLabels`, `edgeIndices`, `edgeFeatures`
 *
 * Only structural presence is checked. Missing labels / relationship types
 * are replaced by defaults so that as much of the export as possible loads.
 */

import { promises as fs } from 'fs';
import { MalformedExportError } from '../errors.js';
import {
  DEFAULT_NODE_LABEL,
  DEFAULT_RELATIONSHIP_TYPE,
  type EdgeTriplet,
  type ExportDocument,
  type ExportedNode,
  type ExportedRelationship,
  type ExternalId,
  type NumericMatrix,
  type PropertyGraphExport,
  type PropertyMap,
  type PropertyValue,
  type TensorExport,
} from '../types/export.js';

type JsonObject = Record<string, unknown>;

const PROPERTY_GRAPH_FIELDS = ['nodes', 'relationships', 'cypherScript'];
const TENSOR_FIELDS = ['nodeFeatures', 'edgeIndices'];

// ============================================
// Entry points
// ============================================

/**
 * Parse an export, picking the shape from the top-level fields present.
 * Property-graph fields win when both shapes are present.
 */
export function parseExportDocument(text: string): ExportDocument {
  const root = parseRoot(text);

  if (PROPERTY_GRAPH_FIELDS.some(field => field in root)) {
    return readPropertyGraph(root);
  }
  if (TENSOR_FIELDS.some(field => field in root)) {
    return readTensor(root);
  }

  throw new MalformedExportError(
    'Export has neither property-graph fields (nodes, relationships, cypherScript) ' +
    'nor tensor fields (nodeFeatures, edgeIndices)',
    { fields: Object.keys(root) }
  );
}

export function parsePropertyGraphExport(text: string): PropertyGraphExport {
  return readPropertyGraph(parseRoot(text));
}

export function parseTensorExport(text: string): TensorExport {
  return readTensor(parseRoot(text));
}

export async function loadExportDocument(filePath: string): Promise<ExportDocument> {
  return parseExportDocument(await fs.readFile(filePath, 'utf-8'));
}

export async function loadPropertyGraphExport(filePath: string): Promise<PropertyGraphExport> {
  return parsePropertyGraphExport(await fs.readFile(filePath, 'utf-8'));
}

export async function loadTensorExport(filePath: string): Promise<TensorExport> {
  return parseTensorExport(await fs.readFile(filePath, 'utf-8'));
}

/**
 * Split a "src,rel,dst" key into its triplet
 */
export function parseTripletKey(key: string): EdgeTriplet {
  const parts = key.split(',');
  if (parts.length !== 3 || parts.some(part => part.length === 0)) {
    throw new MalformedExportError(
      `Edge key "${key}" is not a "source,relation,destination" triplet`,
      { key }
    );
  }
  const [source, relation, destination] = parts;
  return { source, relation, destination };
}

export function formatTripletKey(triplet: EdgeTriplet): string {
  return `${triplet.source},${triplet.relation},${triplet.destination}`;
}

// ============================================
// Property-graph shape
// ============================================

function readPropertyGraph(root: JsonObject): PropertyGraphExport {
  const nodes = readArray(root, 'nodes').map((raw, index) => readNode(raw, index));
  const relationships = readArray(root, 'relationships').map((raw, index) =>
    readRelationship(raw, index)
  );

  const doc: PropertyGraphExport = { kind: 'property-graph', nodes, relationships };

  if (root.cypherScript !== undefined) {
    if (typeof root.cypherScript !== 'string') {
      throw new MalformedExportError('cypherScript must be a string');
    }
    doc.cypherScript = root.cypherScript;
  }

  return doc;
}

function readNode(raw: unknown, index: number): ExportedNode {
  if (!isObject(raw)) {
    throw new MalformedExportError(`nodes[${index}] is not an object`, { index });
  }

  const id = raw.id;
  if (!isExternalId(id)) {
    throw new MalformedExportError(`nodes[${index}] has no string or number "id"`, { index });
  }

  let labels: string[] = [DEFAULT_NODE_LABEL];
  if (raw.labels !== undefined && raw.labels !== null) {
    if (!Array.isArray(raw.labels) || !raw.labels.every(label => typeof label === 'string')) {
      throw new MalformedExportError(`nodes[${index}].labels must be an array of strings`, {
        index,
        id,
      });
    }
    const declared = raw.labels.filter((label): label is string => typeof label === 'string' && label.length > 0);
    if (declared.length > 0) {
      labels = declared;
    }
  }

  return {
    id,
    labels,
    properties: readProperties(raw.properties, `nodes[${index}]`),
  };
}

function readRelationship(raw: unknown, index: number): ExportedRelationship {
  if (!isObject(raw)) {
    throw new MalformedExportError(`relationships[${index}] is not an object`, { index });
  }

  const type = typeof raw.type === 'string' && raw.type.length > 0
    ? raw.type
    : DEFAULT_RELATIONSHIP_TYPE;

  return {
    type,
    startNodeId: readEndpoint(raw.startNodeId, index, 'startNodeId'),
    endNodeId: readEndpoint(raw.endNodeId, index, 'endNodeId'),
    properties: readProperties(raw.properties, `relationships[${index}]`),
  };
}

function readEndpoint(value: unknown, index: number, field: string): ExternalId | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isExternalId(value)) {
    throw new MalformedExportError(
      `relationships[${index}].${field} must be a string or number`,
      { index }
    );
  }
  return value;
}

function readProperties(value: unknown, where: string): PropertyMap {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObject(value)) {
    throw new MalformedExportError(`${where}.properties must be an object`);
  }

  const properties: PropertyMap = {};
  for (const [key, raw] of Object.entries(value)) {
    properties[key] = toPropertyValue(raw);
  }
  return properties;
}

function toPropertyValue(value: unknown): PropertyValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toPropertyValue);
  }
  if (isObject(value)) {
    const nested: Record<string, PropertyValue> = {};
    for (const [key, raw] of Object.entries(value)) {
      nested[key] = toPropertyValue(raw);
    }
    return nested;
  }
  // JSON.parse never yields anything else
  return null;
}

// ============================================
// Tensor shape
// ============================================

function readTensor(root: JsonObject): TensorExport {
  const nodeFeatures = readMatrixMap(root, 'nodeFeatures');
  const edgeIndices = readMatrixMap(root, 'edgeIndices');
  const edgeFeatures = readMatrixMap(root, 'edgeFeatures');

  for (const key of [...Object.keys(edgeIndices), ...Object.keys(edgeFeatures)]) {
    parseTripletKey(key);
  }

  const nodeLabels: Record<string, string[]> = {};
  const rawLabels = root.nodeLabels;
  if (rawLabels !== undefined && rawLabels !== null) {
    if (!isObject(rawLabels)) {
      throw new MalformedExportError('nodeLabels must be an object');
    }
    for (const [nodeType, labels] of Object.entries(rawLabels)) {
      if (!Array.isArray(labels) || !labels.every(label => typeof label === 'string')) {
        throw new MalformedExportError(`nodeLabels["${nodeType}"] must be an array of strings`);
      }
      nodeLabels[nodeType] = labels.filter((label): label is string => typeof label === 'string');
    }
  }

  return { kind: 'tensor', nodeFeatures, nodeLabels, edgeIndices, edgeFeatures };
}

function readMatrixMap(root: JsonObject, field: string): Record<string, NumericMatrix> {
  const raw = root[field];
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isObject(raw)) {
    throw new MalformedExportError(`${field} must be an object`);
  }

  const result: Record<string, NumericMatrix> = {};
  for (const [key, matrix] of Object.entries(raw)) {
    result[key] = readMatrix(matrix, `${field}["${key}"]`);
  }
  return result;
}

function readMatrix(value: unknown, where: string): NumericMatrix {
  if (!Array.isArray(value)) {
    throw new MalformedExportError(`${where} must be a 2-D array of numbers`);
  }
  return value.map((row, rowIndex) => {
    if (!Array.isArray(row)) {
      throw new MalformedExportError(`${where}[${rowIndex}] must be an array of numbers`);
    }
    return row.map((cell, cellIndex) => {
      if (typeof cell !== 'number') {
        throw new MalformedExportError(`${where}[${rowIndex}][${cellIndex}] is not a number`);
      }
      return cell;
    });
  });
}

// ============================================
// Helpers
// ============================================

function parseRoot(text: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedExportError(
      `Export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isObject(parsed)) {
    throw new MalformedExportError('Export must be a JSON object');
  }
  return parsed;
}

function readArray(root: JsonObject, field: string): unknown[] {
  const value = root[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedExportError(`${field} must be an array`);
  }
  return value;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isExternalId(value: unknown): value is ExternalId {
  return typeof value === 'string' || typeof value === 'number';
}
