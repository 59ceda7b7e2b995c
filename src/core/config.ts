/**
 * Pipeline configuration loaded from config/pipeline.json with env overrides
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { validatePipelineConfig } from '@/validation/ajv_instance';
import { ConfigurationError } from './errors';

export interface DelayRange {
  min: number;
  max: number;
}

export interface SequentialConfig {
  /** Universes at or below this size run in-process. */
  threshold: number;
  batchSize: number;
  tickerDelayMs: number;
  batchDelayMs: number;
}

export interface DistributedConfig {
  chunkSize: number;
  dispatchDelayMs: number;
  perChunkEstimateSeconds: number;
  maxEstimateSeconds: number;
}

export interface FetchConfig {
  maxWorkers: number;
  maxRequestsPerMinute: number;
  maxAttempts: number;
  baseDelayMs: number;
  jitterMs: number;
  preFetchDelayMs: DelayRange;
  primaryTimeoutMs: number;
  secondaryTimeoutMs: number;
  minPrimaryFields: number;
  minSecondaryMetrics: number;
  allowSynthetic: boolean;
}

export interface ScoringConfig {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface StorageLayout {
  chunkPrefix: string;
  statusPrefix: string;
  manifestPrefix: string;
}

export interface OutputConfig {
  topN: number;
  csvFilename: string;
  includeProvenance: boolean;
}

export interface PipelineConfig {
  sequential: SequentialConfig;
  distributed: DistributedConfig;
  fetch: FetchConfig;
  scoring: ScoringConfig;
  storage: StorageLayout;
  output: OutputConfig;
}

let cachedConfig: PipelineConfig | null = null;

function resolveConfigPath(projectRoot: string): string {
  const envPath = process.env.PIPELINE_CONFIG;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'pipeline.json');
}

function parsePositiveInt(name: string): number | null {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function applyEnvOverrides(config: PipelineConfig): PipelineConfig {
  const chunkSize = parsePositiveInt('CHUNK_SIZE');
  const maxWorkers = parsePositiveInt('MAX_WORKERS');
  const threshold = parsePositiveInt('SEQUENTIAL_THRESHOLD');

  return {
    ...config,
    sequential: {
      ...config.sequential,
      threshold: threshold ?? config.sequential.threshold,
    },
    distributed: {
      ...config.distributed,
      chunkSize: chunkSize ?? config.distributed.chunkSize,
    },
    fetch: {
      ...config.fetch,
      maxWorkers: maxWorkers ?? config.fetch.maxWorkers,
    },
  };
}

export function loadPipelineConfig(projectRoot: string = process.cwd()): PipelineConfig {
  const configPath = resolveConfigPath(projectRoot);
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Pipeline config not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Pipeline config is not valid JSON: ${configPath}`, {
      cause: error,
    });
  }

  const result = validatePipelineConfig(raw);
  if (!result.valid || !result.data) {
    throw new ConfigurationError(
      `Invalid pipeline config ${configPath}: ${(result.errors ?? []).join('; ')}`
    );
  }

  const { preFetchDelayMs } = result.data.fetch;
  if (preFetchDelayMs.max < preFetchDelayMs.min) {
    throw new ConfigurationError('fetch.preFetchDelayMs.max must be >= min');
  }

  return applyEnvOverrides(result.data);
}

export function getPipelineConfig(): PipelineConfig {
  if (!cachedConfig) {
    cachedConfig = loadPipelineConfig();
  }
  return cachedConfig;
}

export function resetPipelineConfig(): void {
  cachedConfig = null;
}
