/**
 * Ajv validation instance with schema validators
 * Every payload crossing a process or service boundary is checked here
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';
import type { PipelineConfig } from '@/core/config';
import type { UniverseFileV1 } from '@/core/universe';
import type {
  ChunkResultV1,
  ChunkStatusV1,
  InvocationEvent,
  RunManifestV1,
  ScoreResponseV1,
} from '@/types/contracts';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date-time, email, uri, etc.)
addFormats(ajv);

function lazyValidator<T>(name: SchemaName): () => ValidateFunction<T> {
  let validate: ValidateFunction<T> | null = null;
  return () => {
    if (!validate) {
      validate = ajv.compile<T>(loadSchema(name));
    }
    return validate;
  };
}

// Lazy-loaded validators
const pipelineConfigValidator = lazyValidator<PipelineConfig>('pipeline_config.v1');
const scoreResponseValidator = lazyValidator<ScoreResponseV1>('score_response.v1');
const chunkResultValidator = lazyValidator<ChunkResultV1>('chunk_result.v1');
const chunkStatusValidator = lazyValidator<ChunkStatusV1>('chunk_status.v1');
const runManifestValidator = lazyValidator<RunManifestV1>('run_manifest.v1');
const invocationValidator = lazyValidator<InvocationEvent>('invocation.v1');
const universeValidator = lazyValidator<UniverseFileV1>('universe.v1');

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function validateWith<T>(
  getValidate: () => ValidateFunction<T>,
  data: unknown
): ValidationResult<T> {
  const validate = getValidate();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validatePipelineConfig(data: unknown): ValidationResult<PipelineConfig> {
  return validateWith(pipelineConfigValidator, data);
}

export function validateScoreResponse(data: unknown): ValidationResult<ScoreResponseV1> {
  return validateWith(scoreResponseValidator, data);
}

export function validateChunkResult(data: unknown): ValidationResult<ChunkResultV1> {
  return validateWith(chunkResultValidator, data);
}

export function validateChunkStatus(data: unknown): ValidationResult<ChunkStatusV1> {
  return validateWith(chunkStatusValidator, data);
}

export function validateRunManifest(data: unknown): ValidationResult<RunManifestV1> {
  return validateWith(runManifestValidator, data);
}

export function validateInvocationEvent(data: unknown): ValidationResult<InvocationEvent> {
  return validateWith(invocationValidator, data);
}

export function validateUniverseFile(data: unknown): ValidationResult<UniverseFileV1> {
  return validateWith(universeValidator, data);
}
