/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv';

export type SchemaName =
  | 'pipeline_config.v1'
  | 'score_response.v1'
  | 'chunk_result.v1'
  | 'chunk_status.v1'
  | 'run_manifest.v1'
  | 'invocation.v1'
  | 'universe.v1';

const schemaCache = new Map<SchemaName, SchemaObject>();

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
