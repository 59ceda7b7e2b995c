/**
 * Wire formats shared with external collaborators: universe files,
 * invocation payloads, published chunk objects and the scoring reply.
 * Each has a JSON schema under schemas/.
 */

import type { Provenance } from './pipeline';

export interface WireStockRecord {
  Symbol: string;
  Sector?: string;
}

export interface ProcessChunkEvent {
  operation: 'process_chunk';
  chunk_id: string;
  run_id: string;
  stocks: WireStockRecord[];
}

export interface FinalizeResultsEvent {
  operation: 'finalize_results';
  run_id?: string;
}

export interface OrchestrateEvent {
  operation?: 'orchestrate';
  stocks?: WireStockRecord[];
  universe?: string;
  test_mode?: boolean;
  test_symbols?: string[];
}

export type WorkerEvent = ProcessChunkEvent | FinalizeResultsEvent;

export type InvocationEvent = WorkerEvent | OrchestrateEvent;

export interface ChunkResultRowV1 {
  Symbol: string;
  Sector: string;
  BuyScore: number;
  ReasonsToBuy: string;
  Provenance: Provenance;
}

export interface ChunkResultV1 {
  chunk_id: string;
  run_id: string;
  created_at: string;
  rows: ChunkResultRowV1[];
}

export interface ScoreResponseEntryV1 {
  BuyScore: number;
  ReasonsToBuy: string[];
}

export type ScoreResponseV1 = Record<string, ScoreResponseEntryV1>;

export type ChunkSettlement = 'published' | 'empty' | 'failed';

export interface ChunkStatusV1 {
  run_id: string;
  chunk_id: string;
  status: ChunkSettlement;
  result_count: number;
  finished_at: string;
}

export interface RunManifestV1 {
  run_id: string;
  created_at: string;
  universe_size: number;
  expected_chunk_ids: string[];
}
