/**
 * Executes one invocation payload, as launched by the process invoker.
 *
 * Usage: WORKER_PAYLOAD='{"operation":"finalize_results"}' npx tsx scripts/worker.ts
 *        npx tsx scripts/worker.ts '<json payload>'
 */

import './load_env';
import { createChildLogger } from '../src/utils/logger';
import { createPipelineServices } from '../src/run/services';
import { handleInvocation } from '../src/run/handler';
import { WORKER_PAYLOAD_ENV } from '../src/dispatch/process_invoker';

const logger = createChildLogger('worker');

async function main(): Promise<void> {
  const raw = process.env[WORKER_PAYLOAD_ENV] ?? process.argv[2];
  if (!raw) {
    logger.error(`No payload: set ${WORKER_PAYLOAD_ENV} or pass JSON as the first argument`);
    process.exitCode = 1;
    return;
  }

  let event: unknown;
  try {
    event = JSON.parse(raw);
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Payload is not JSON');
    process.exitCode = 1;
    return;
  }

  const response = await handleInvocation(event, createPipelineServices());
  logger.info({ statusCode: response.statusCode, body: response.body }, 'Worker finished');
  if (response.statusCode !== 200) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Worker crashed');
  process.exitCode = 1;
});
