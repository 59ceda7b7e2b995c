/**
 * Completion tracking for distributed runs.
 *
 * The orchestrator records which chunks a run expects. Each chunk worker
 * records a status marker when it settles and then checks the run; the
 * first worker to see every expected marker claims the run and dispatches
 * finalize_results. The claim is a create-if-absent write, so at most one
 * dispatch happens per run.
 */

import { createChildLogger } from '@/utils/logger';
import type { StorageLayout } from '@/core/config';
import type { ObjectStore } from '@/storage/types';
import { finalizeClaimKey, manifestKey, runPrefix } from '@/storage/keys';
import type { WorkerInvoker } from '@/dispatch/process_invoker';
import type { RunManifestV1 } from '@/types/contracts';
import { validateChunkStatus, validateRunManifest } from '@/validation/ajv_instance';

const logger = createChildLogger('completion');

export class CompletionTracker {
  constructor(
    private readonly store: ObjectStore,
    private readonly layout: StorageLayout,
    private readonly invoker: WorkerInvoker,
    private readonly now: () => Date = () => new Date()
  ) {}

  async registerRun(manifest: RunManifestV1): Promise<boolean> {
    try {
      await this.store.put(manifestKey(this.layout, manifest.run_id), JSON.stringify(manifest));
      return true;
    } catch (error) {
      logger.warn(
        { runId: manifest.run_id, error: error instanceof Error ? error.message : String(error) },
        'Failed to record run manifest; finalize must be scheduled externally'
      );
      return false;
    }
  }

  async readManifest(runId: string): Promise<RunManifestV1 | null> {
    const body = await this.store.get(manifestKey(this.layout, runId));
    if (body === null) return null;
    const result = validateRunManifest(JSON.parse(body));
    if (!result.valid || !result.data) {
      logger.warn({ runId, errors: result.errors }, 'Run manifest is invalid');
      return null;
    }
    return result.data;
  }

  async settledChunkIds(runId: string): Promise<Set<string>> {
    const keys = await this.store.list(runPrefix(this.layout.statusPrefix, runId));
    const settled = new Set<string>();
    for (const key of keys) {
      const body = await this.store.get(key);
      if (body === null) continue;
      const result = validateChunkStatus(JSON.parse(body));
      if (result.valid && result.data && result.data.run_id === runId) {
        settled.add(result.data.chunk_id);
      } else {
        logger.warn({ key, errors: result.errors }, 'Ignoring invalid chunk status');
      }
    }
    return settled;
  }

  /** Dispatches finalize_results when every expected chunk has settled. */
  async signalIfComplete(runId: string): Promise<boolean> {
    try {
      const manifest = await this.readManifest(runId);
      if (!manifest) {
        logger.debug({ runId }, 'Run is not tracked');
        return false;
      }

      const settled = await this.settledChunkIds(runId);
      const pending = manifest.expected_chunk_ids.filter((id) => !settled.has(id));
      if (pending.length > 0) {
        logger.debug({ runId, pending: pending.length }, 'Run still has pending chunks');
        return false;
      }

      const claimKey = finalizeClaimKey(this.layout, runId);
      const claimed = await this.store.putIfAbsent(claimKey, this.now().toISOString());
      if (!claimed) {
        return false;
      }

      const dispatched = await this.invoker.invoke({ operation: 'finalize_results', run_id: runId });
      if (!dispatched) {
        await this.store.delete(claimKey);
        logger.warn({ runId }, 'Finalize dispatch failed, claim released');
        return false;
      }

      logger.info({ runId, chunks: manifest.expected_chunk_ids.length }, 'All chunks settled, finalize dispatched');
      return true;
    } catch (error) {
      logger.error(
        { runId, error: error instanceof Error ? error.message : String(error) },
        'Completion check failed'
      );
      return false;
    }
  }
}
