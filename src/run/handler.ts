/**
 * Invocation entry point. Validates the payload, routes it, and always
 * answers with a status code instead of throwing.
 */

import { createChildLogger } from '@/utils/logger';
import { PipelineError, sanitizeError } from '@/core/errors';
import { normalizeStockRecords, type UniverseDescriptor } from '@/core/universe';
import { validateInvocationEvent } from '@/validation/ajv_instance';
import type { StockRecord } from '@/types/pipeline';
import type { Orchestrator, OrchestratorResult } from './orchestrator';
import type { ChunkWorker, ChunkWorkerResult } from './chunk_worker';
import type { Aggregator, AggregationResult } from './aggregator';

const logger = createChildLogger('handler');

export interface InvocationTargets {
  orchestrator: Orchestrator;
  worker: ChunkWorker;
  aggregator: Aggregator;
  loadUniverse: (descriptor: UniverseDescriptor) => Promise<StockRecord[]>;
}

export interface ErrorBody {
  error: string;
  code: string;
  details?: string[];
}

export type InvocationResponse =
  | { statusCode: 200; body: OrchestratorResult | ChunkWorkerResult | AggregationResult }
  | { statusCode: 400 | 500; body: ErrorBody };

function errorResponse(error: unknown): InvocationResponse {
  if (error instanceof PipelineError) {
    const statusCode = error.code === 'INPUT_ERROR' ? 400 : 500;
    return { statusCode, body: { error: error.message, code: error.code } };
  }
  return { statusCode: 500, body: { error: sanitizeError(error), code: 'INTERNAL_ERROR' } };
}

export async function handleInvocation(
  event: unknown,
  targets: InvocationTargets
): Promise<InvocationResponse> {
  const validation = validateInvocationEvent(event ?? {});
  if (!validation.valid || !validation.data) {
    logger.warn({ errors: validation.errors }, 'Rejected invalid invocation payload');
    return {
      statusCode: 400,
      body: { error: 'Invalid invocation payload', code: 'INPUT_ERROR', details: validation.errors ?? [] },
    };
  }

  const payload = validation.data;
  try {
    if (payload.operation === 'process_chunk') {
      const result = await targets.worker.process({
        chunkId: payload.chunk_id,
        runId: payload.run_id,
        stocks: normalizeStockRecords(payload.stocks),
      });
      return { statusCode: 200, body: result };
    }

    if (payload.operation === 'finalize_results') {
      const result = await targets.aggregator.finalize(payload.run_id);
      return { statusCode: 200, body: result };
    }

    const universe = await targets.loadUniverse({
      stocks: payload.stocks,
      universe: payload.universe,
      testMode: payload.test_mode,
      testSymbols: payload.test_symbols,
    });
    const result = await targets.orchestrator.run(universe);
    return { statusCode: 200, body: result };
  } catch (error) {
    logger.error(
      { operation: payload.operation ?? 'orchestrate', error: error instanceof Error ? error.message : String(error) },
      'Invocation failed'
    );
    return errorResponse(error);
  }
}
