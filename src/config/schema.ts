/**
 * Configuration schema
 */

import { z } from 'zod';

export const neo4jConfigSchema = z.object({
  uri: z.string().min(1),
  username: z.string(),
  password: z.string(),
  database: z.string().min(1).optional(),
});

export const importConfigSchema = z.object({
  identityProperty: z.string().min(1),
  removeIdentityProperty: z.boolean(),
  defaultLabel: z.string().min(1),
  defaultRelationshipType: z.string().min(1),
});

export const gatewayConfigSchema = z.object({
  resultLimit: z.number().int().positive(),
  sampleLimit: z.number().int().positive(),
  schemaLabelLimit: z.number().int().positive(),
  schemaSampleSize: z.number().int().positive(),
  schemaPropertyLimit: z.number().int().positive(),
});

export const graphportConfigSchema = z.object({
  neo4j: neo4jConfigSchema,
  import: importConfigSchema,
  gateway: gatewayConfigSchema,
});

export type GraphportConfig = z.infer<typeof graphportConfigSchema>;
export type ImportConfig = z.infer<typeof importConfigSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;

export const DEFAULT_CONFIG: GraphportConfig = {
  neo4j: {
    uri: 'bolt://localhost:7687',
    username: 'neo4j',
    password: 'password',
  },
  import: {
    identityProperty: '_exportId',
    removeIdentityProperty: false,
    defaultLabel: 'Node',
    defaultRelationshipType: 'RELATED_TO',
  },
  gateway: {
    resultLimit: 25,
    sampleLimit: 5,
    schemaLabelLimit: 30,
    schemaSampleSize: 50,
    schemaPropertyLimit: 20,
  },
};
