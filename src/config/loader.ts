/**
 * Configuration Loader
 *
 * Resolution order (later wins):
 *   1. built-in defaults
 *   2. NEO4J_URI / NEO4J_USERNAME / NEO4J_PASSWORD / NEO4J_DATABASE
 *   3. YAML config file (graphport.yaml in the working directory, or an explicit path)
 *   4. overrides passed by the caller (CLI flags)
 *
 * String values in the YAML file may reference environment variables as ${NAME}.
 */

import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { ConfigError } from '../errors.js';
import { DEFAULT_CONFIG, graphportConfigSchema, type GraphportConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'graphport.yaml';

export type ConfigOverrides = {
  [K in keyof GraphportConfig]?: Partial<GraphportConfig[K]>;
};

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Directory searched for graphport.yaml (default: cwd) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge, with `override` taking precedence. Arrays are replaced, undefined is skipped.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }

  return result;
}

/**
 * Replace ${NAME} placeholders in every string of a parsed YAML tree
 */
export function expandEnvPlaceholders(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable ${name} is referenced in the config but not set`, {
          variable: name,
        });
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvPlaceholders(item, env));
  }
  if (isPlainObject(value)) {
    const result: PlainObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = expandEnvPlaceholders(entry, env);
    }
    return result;
  }
  return value;
}

export function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const neo4j: Partial<GraphportConfig['neo4j']> = {};
  if (env.NEO4J_URI) neo4j.uri = env.NEO4J_URI;
  if (env.NEO4J_USERNAME) neo4j.username = env.NEO4J_USERNAME;
  if (env.NEO4J_PASSWORD) neo4j.password = env.NEO4J_PASSWORD;
  if (env.NEO4J_DATABASE) neo4j.database = env.NEO4J_DATABASE;
  return { neo4j };
}

/**
 * Read and parse a YAML config file. Returns null when the file does not exist.
 */
async function readConfigFile(filePath: string, env: NodeJS.ProcessEnv): Promise<PlainObject | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Config file ${filePath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }

  const expanded = expandEnvPlaceholders(parsed, env);
  return isPlainObject(expanded) ? expanded : {};
}

export function validateConfig(raw: unknown, source = 'configuration'): GraphportConfig {
  const result = graphportConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<GraphportConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let merged: PlainObject = deepMerge(DEFAULT_CONFIG, envOverrides(env));

  const filePath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.join(cwd, DEFAULT_CONFIG_FILE);
  const fromFile = await readConfigFile(filePath, env);

  if (fromFile === null && options.configPath) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }
  if (fromFile) {
    merged = deepMerge(merged, fromFile);
  }

  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged, fromFile ? `config (${filePath})` : 'configuration');
}
