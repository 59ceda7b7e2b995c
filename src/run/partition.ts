import { randomHex } from '@/utils/hash';
import type { ChunkJob, StockRecord } from '@/types/pipeline';

export function createChunkId(index: number, suffix: string = randomHex(8)): string {
  return `chunk_${index}_${suffix}`;
}

/** ceil(N / chunkSize) jobs, in universe order; chunk ids are 1-based. */
export function partitionUniverse(
  stocks: StockRecord[],
  chunkSize: number,
  runId: string,
  makeId: (index: number) => string = (index) => createChunkId(index)
): ChunkJob[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const jobs: ChunkJob[] = [];
  for (let start = 0; start < stocks.length; start += chunkSize) {
    jobs.push({
      chunkId: makeId(jobs.length + 1),
      runId,
      stocks: stocks.slice(start, start + chunkSize),
    });
  }
  return jobs;
}
