/**
 * Starts an analysis run.
 *
 * Usage:
 *   npx tsx scripts/run_analysis.ts --test
 *   npx tsx scripts/run_analysis.ts --universe=mega_caps
 *   npx tsx scripts/run_analysis.ts --symbols=AAPL,MSFT,NVDA
 *   npx tsx scripts/run_analysis.ts            (S&P 500 constituents)
 */

import './load_env';
import { createChildLogger } from '../src/utils/logger';
import { createPipelineServices } from '../src/run/services';
import { handleInvocation } from '../src/run/handler';
import type { OrchestrateEvent } from '../src/types/contracts';

const logger = createChildLogger('run_analysis');

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const eqArg = process.argv.find((arg) => arg.startsWith(prefix));
  if (eqArg) return eqArg.slice(prefix.length);
  const index = process.argv.indexOf(`--${name}`);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function parseEvent(): OrchestrateEvent {
  const event: OrchestrateEvent = { operation: 'orchestrate' };
  if (process.argv.includes('--test')) {
    event.test_mode = true;
  }
  const universe = readArg('universe');
  if (universe) {
    event.universe = universe;
  }
  const symbols = readArg('symbols');
  if (symbols) {
    event.stocks = symbols
      .split(',')
      .map((symbol) => symbol.trim())
      .filter((symbol) => symbol.length > 0)
      .map((symbol) => ({ Symbol: symbol }));
  }
  return event;
}

async function main(): Promise<void> {
  const event = parseEvent();
  logger.info({ event }, 'Starting analysis');

  const response = await handleInvocation(event, createPipelineServices());
  console.log(JSON.stringify(response, null, 2));
  if (response.statusCode !== 200) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Analysis failed');
  process.exitCode = 1;
});
