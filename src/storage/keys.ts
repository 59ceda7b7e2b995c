import type { StorageLayout } from '@/core/config';

function trimSlashes(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export function runPrefix(prefix: string, runId?: string): string {
  const base = `${trimSlashes(prefix)}/`;
  return runId ? `${base}${runId}/` : base;
}

export function chunkResultKey(layout: StorageLayout, runId: string, chunkId: string): string {
  return `${runPrefix(layout.chunkPrefix, runId)}${chunkId}.json`;
}

export function chunkStatusKey(layout: StorageLayout, runId: string, chunkId: string): string {
  return `${runPrefix(layout.statusPrefix, runId)}${chunkId}.json`;
}

export function manifestKey(layout: StorageLayout, runId: string): string {
  return `${runPrefix(layout.manifestPrefix, runId)}manifest.json`;
}

export function finalizeClaimKey(layout: StorageLayout, runId: string): string {
  return `${runPrefix(layout.manifestPrefix, runId)}finalize.claim`;
}

/** Run id segment of a key stored under `prefix`, or null. */
export function runIdFromKey(prefix: string, key: string): string | null {
  const base = runPrefix(prefix);
  if (!key.startsWith(base)) return null;
  const rest = key.slice(base.length);
  const slash = rest.indexOf('/');
  return slash > 0 ? rest.slice(0, slash) : null;
}
