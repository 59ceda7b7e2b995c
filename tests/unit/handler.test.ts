import { afterEach, describe, expect, it } from 'vitest';
import { handleInvocation } from '@/run/handler';
import { RecordingInvoker } from '../helpers/fixtures';
import { createTestPipeline, type TestPipeline } from '../helpers/pipeline';

let pipeline: TestPipeline | null = null;

afterEach(() => {
  pipeline?.store.close();
  pipeline = null;
});

describe('handleInvocation', () => {
  it('runs test mode through the sequential path', async () => {
    pipeline = createTestPipeline();
    const response = await handleInvocation({ test_mode: true }, pipeline);
    expect(response).toMatchObject({ statusCode: 200, body: { mode: 'sequential', resultsCount: 5 } });
  });

  it('accepts explicit stock records', async () => {
    pipeline = createTestPipeline();
    const response = await handleInvocation(
      { operation: 'orchestrate', stocks: [{ Symbol: 'ko', Sector: 'Staples' }, { Symbol: 'PEP' }] },
      pipeline
    );
    expect(response).toMatchObject({ statusCode: 200, body: { attempted: 2, totalScored: 2 } });
    expect(pipeline.primary.calls).toEqual(['KO', 'PEP']);
  });

  it('rejects payloads that fail validation', async () => {
    pipeline = createTestPipeline();

    const missingFields = await handleInvocation({ operation: 'process_chunk', chunk_id: 'chunk_1_x' }, pipeline);
    expect(missingFields).toMatchObject({ statusCode: 400, body: { code: 'INPUT_ERROR' } });

    const unknown = await handleInvocation({ operation: 'rebalance' }, pipeline);
    expect(unknown.statusCode).toBe(400);

    const notObject = await handleInvocation('orchestrate', pipeline);
    expect(notObject.statusCode).toBe(400);
  });

  it('maps an empty universe to 400', async () => {
    pipeline = createTestPipeline();
    const response = await handleInvocation({ stocks: [] }, pipeline);
    expect(response).toEqual({
      statusCode: 400,
      body: { error: 'Universe contains no valid stock records', code: 'INPUT_ERROR' },
    });
  });

  it('maps a missing recipient to 500 before any work starts', async () => {
    pipeline = createTestPipeline({ recipient: null });
    const response = await handleInvocation({ test_mode: true }, pipeline);
    expect(response).toEqual({
      statusCode: 500,
      body: { error: 'EMAIL_RECIPIENT is required to deliver results', code: 'CONFIGURATION_ERROR' },
    });
    expect(pipeline.primary.calls).toHaveLength(0);
  });

  it('hides unexpected error details', async () => {
    pipeline = createTestPipeline({
      invoker: new RecordingInvoker(() => {
        throw new Error('spawn exploded at /srv/internal/path');
      }),
    });
    const stocks = Array.from({ length: 101 }, (_, i) => ({ Symbol: `X${i}` }));

    const response = await handleInvocation({ stocks }, pipeline);
    expect(response).toEqual({
      statusCode: 500,
      body: { error: 'An internal error occurred', code: 'INTERNAL_ERROR' },
    });
  });

  it('routes finalize_results to the aggregator', async () => {
    pipeline = createTestPipeline();
    const response = await handleInvocation({ operation: 'finalize_results' }, pipeline);
    expect(response).toMatchObject({ statusCode: 200, body: { status: 'empty', runIds: [] } });
  });
});
