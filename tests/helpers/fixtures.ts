import { loadPipelineConfig, type PipelineConfig } from '@/core/config';
import { emptyMetrics, type Fundamentals, type MetricValues, type Provenance } from '@/types/pipeline';
import type { FundamentalsSource, SourcePayload } from '@/providers/types';
import type { ScoringClient } from '@/llm/client';
import type { EmailMessage, EmailSender } from '@/notify/email';
import type { WorkerInvoker } from '@/dispatch/process_invoker';
import type { WorkerEvent } from '@/types/contracts';
import type { ObjectStore } from '@/storage/types';

/** The shipped config with every delay zeroed. */
export function testConfig(): PipelineConfig {
  const config = loadPipelineConfig(process.cwd());
  return {
    ...config,
    sequential: { ...config.sequential, tickerDelayMs: 0, batchDelayMs: 0 },
    distributed: { ...config.distributed, dispatchDelayMs: 0 },
    fetch: {
      ...config.fetch,
      baseDelayMs: 0,
      jitterMs: 0,
      preFetchDelayMs: { min: 0, max: 0 },
    },
  };
}

export const noSleep = async (): Promise<void> => {};

export function makeMetrics(overrides: Partial<MetricValues> = {}): MetricValues {
  return { ...emptyMetrics(), ...overrides };
}

export function makeFundamentals(
  symbol: string,
  pe: number | null,
  provenance: Provenance = 'primary'
): Fundamentals {
  return { symbol, provenance, metrics: makeMetrics({ 'P/E Ratio': pe, EPS: 2.5 }) };
}

export function payload(pe: number | null, rawFieldCount = 10): SourcePayload {
  return { metrics: makeMetrics({ 'P/E Ratio': pe, EPS: 3.1 }), rawFieldCount };
}

/** Source answering from a per-symbol handler. */
export class StubSource implements FundamentalsSource {
  readonly calls: string[] = [];

  constructor(
    readonly name: string,
    private readonly handler: (symbol: string, call: number) => SourcePayload | Error
  ) {}

  async getFundamentals(symbol: string): Promise<SourcePayload> {
    this.calls.push(symbol);
    const result = this.handler(symbol, this.calls.filter((s) => s === symbol).length);
    if (result instanceof Error) throw result;
    return result;
  }
}

/** Symbols listed in a scoring prompt, in stanza order. */
export function symbolsInPrompt(prompt: string): string[] {
  return [...prompt.matchAll(/^([A-Z][A-Z0-9.-]*):$/gm)].map((match) => match[1]);
}

/**
 * Scoring client that answers with a JSON object covering every symbol in
 * the prompt; scores come from `scores` (default 5).
 */
export class StubScoringClient implements ScoringClient {
  readonly prompts: string[] = [];

  constructor(
    private readonly scores: Record<string, number> = {},
    private readonly failWith: Error | null = null
  ) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.failWith) throw this.failWith;
    const reply: Record<string, { BuyScore: number; ReasonsToBuy: string[] }> = {};
    for (const symbol of symbolsInPrompt(prompt)) {
      reply[symbol] = {
        BuyScore: this.scores[symbol] ?? 5,
        ReasonsToBuy: [`${symbol} reason one`, `${symbol} reason two`],
      };
    }
    return JSON.stringify(reply);
  }
}

export class RecordingInvoker implements WorkerInvoker {
  readonly events: WorkerEvent[] = [];

  constructor(private readonly accept: (event: WorkerEvent, index: number) => boolean = () => true) {}

  async invoke(event: WorkerEvent): Promise<boolean> {
    this.events.push(event);
    return this.accept(event, this.events.length - 1);
  }
}

export class RecordingEmailSender implements EmailSender {
  readonly messages: EmailMessage[] = [];

  constructor(private readonly failWith: Error | null = null) {}

  async send(message: EmailMessage): Promise<string | null> {
    this.messages.push(message);
    if (this.failWith) throw this.failWith;
    return `<message-${this.messages.length}@test>`;
  }
}

/** Delegating store whose writes fail for matching keys. */
export class FlakyStore implements ObjectStore {
  constructor(
    private readonly inner: ObjectStore,
    private readonly failPut: (key: string) => boolean
  ) {}

  async put(key: string, body: string): Promise<void> {
    if (this.failPut(key)) throw new Error(`write refused for ${key}`);
    return this.inner.put(key, body);
  }

  putIfAbsent(key: string, body: string): Promise<boolean> {
    return this.inner.putIfAbsent(key, body);
  }

  get(key: string): Promise<string | null> {
    return this.inner.get(key);
  }

  list(prefix: string): Promise<string[]> {
    return this.inner.list(prefix);
  }

  delete(key: string): Promise<void> {
    return this.inner.delete(key);
  }
}

/** Minimal RFC 4180 reader for asserting on rendered CSV. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}
