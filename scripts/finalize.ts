/**
 * Scheduled aggregation: collects every published chunk (or one run's with
 * --run-id=<id>), emails the top rows and cleans up.
 *
 * Usage: npx tsx scripts/finalize.ts [--run-id=<id>]
 */

import './load_env';
import { createChildLogger } from '../src/utils/logger';
import { createPipelineServices } from '../src/run/services';
import { handleInvocation } from '../src/run/handler';
import type { FinalizeResultsEvent } from '../src/types/contracts';

const logger = createChildLogger('finalize');

async function main(): Promise<void> {
  const runIdArg = process.argv.find((arg) => arg.startsWith('--run-id='));
  const event: FinalizeResultsEvent = { operation: 'finalize_results' };
  if (runIdArg) {
    event.run_id = runIdArg.slice('--run-id='.length);
  }

  const response = await handleInvocation(event, createPipelineServices());
  console.log(JSON.stringify(response, null, 2));
  if (response.statusCode !== 200) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Finalize failed');
  process.exitCode = 1;
});
