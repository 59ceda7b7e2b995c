/**
 * Wires collaborators into the pipeline stages. Production wiring reads
 * credentials from the environment; tests pass fakes to buildPipeline.
 */

import { createChildLogger } from '@/utils/logger';
import type { PipelineConfig } from '@/core/config';
import { getPipelineConfig } from '@/core/config';
import { getEnvConfig, requireEnvValue, type EnvConfig } from '@/core/env';
import { loadUniverse, type UniverseLoaderOptions } from '@/core/universe';
import { FundamentalsFetcher } from '@/providers/fundamentals_fetcher';
import { YahooQuoteSummaryClient } from '@/providers/yahoo/client';
import { AlphaVantageClient } from '@/providers/alpha_vantage/client';
import type { FundamentalsSource } from '@/providers/types';
import { ParallelChunkProcessor } from '@/pipeline/chunk_processor';
import { OpenAiChatClient, type ScoringClient } from '@/llm/client';
import { ScoringOracleAdapter } from '@/llm/adapter';
import { createSmtpEmailSender, type EmailSender } from '@/notify/email';
import type { ObjectStore } from '@/storage/types';
import { SqliteObjectStore } from '@/storage/sqlite_store';
import { ProcessWorkerInvoker, type WorkerInvoker } from '@/dispatch/process_invoker';
import type { RandomSource, Sleep } from '@/utils/timing';
import { ReportMailer, type ReportAddresses } from './report';
import { ChunkResultPublisher } from './publisher';
import { CompletionTracker } from './completion';
import { ChunkWorker } from './chunk_worker';
import { Orchestrator } from './orchestrator';
import { Aggregator } from './aggregator';
import type { InvocationTargets } from './handler';

const logger = createChildLogger('services');

export interface PipelineCollaborators {
  primary: FundamentalsSource;
  secondary: FundamentalsSource | null;
  scoringClient: ScoringClient;
  emailSender: EmailSender;
  store: ObjectStore;
  invoker: WorkerInvoker;
  /** null when no recipient is configured; runs then fail their precheck. */
  addresses: ReportAddresses | null;
  universeOptions?: UniverseLoaderOptions;
  sleep?: Sleep;
  random?: RandomSource;
  now?: () => Date;
  makeRunId?: (now: Date) => string;
}

export interface Pipeline extends InvocationTargets {
  fetcher: FundamentalsFetcher;
  completion: CompletionTracker;
}

export function buildPipeline(collaborators: PipelineCollaborators, config: PipelineConfig): Pipeline {
  const { sleep, random, now } = collaborators;

  const fetcher = new FundamentalsFetcher({
    primary: collaborators.primary,
    secondary: collaborators.secondary,
    options: config.fetch,
    sleep,
    random,
  });
  const processor = new ParallelChunkProcessor(fetcher, config.fetch, { sleep, random });
  const adapter = new ScoringOracleAdapter(collaborators.scoringClient);
  const report = collaborators.addresses
    ? new ReportMailer(collaborators.emailSender, collaborators.addresses, config.output)
    : null;
  const publisher = new ChunkResultPublisher(collaborators.store, config.storage, now);
  const completion = new CompletionTracker(collaborators.store, config.storage, collaborators.invoker, now);

  return {
    fetcher,
    completion,
    orchestrator: new Orchestrator({
      config,
      fetcher,
      adapter,
      report,
      invoker: collaborators.invoker,
      completion,
      sleep,
      now,
      makeRunId: collaborators.makeRunId,
    }),
    worker: new ChunkWorker({ processor, fetcher, adapter, publisher, completion }),
    aggregator: new Aggregator(collaborators.store, config.storage, report),
    loadUniverse: (descriptor) => loadUniverse(descriptor, collaborators.universeOptions),
  };
}

export function createPipelineServices(
  env: EnvConfig = getEnvConfig(),
  config: PipelineConfig = getPipelineConfig()
): Pipeline {
  const apiKey = requireEnvValue(env.openaiApiKey, 'OPENAI_API_KEY');
  const smtpUrl = requireEnvValue(env.smtpUrl, 'SMTP_URL');

  const secondary = env.alphaVantageApiKey ? new AlphaVantageClient(env.alphaVantageApiKey) : null;
  if (!secondary) {
    logger.info('ALPHA_VANTAGE_API_KEY not set, secondary source disabled');
  }

  return buildPipeline(
    {
      primary: new YahooQuoteSummaryClient(),
      secondary,
      scoringClient: new OpenAiChatClient({
        apiKey,
        model: env.openaiModel,
        baseUrl: env.openaiBaseUrl,
        ...config.scoring,
      }),
      emailSender: createSmtpEmailSender(smtpUrl),
      store: new SqliteObjectStore(env.storageDbPath),
      invoker: new ProcessWorkerInvoker(env.workerCommand),
      addresses: env.emailRecipient
        ? { recipient: env.emailRecipient, sender: env.emailSender ?? env.emailRecipient }
        : null,
    },
    config
  );
}
