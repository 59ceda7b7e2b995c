import { describe, expect, it } from 'vitest';
import { mapQuoteSummary, readYahooNumber, YahooQuoteSummaryClient } from '@/providers/yahoo/client';
import { YahooSessionManager } from '@/providers/yahoo/session';
import { ProviderError } from '@/providers/types';
import type { YahooQuoteSummaryResult } from '@/providers/yahoo/types';

const RESULT: YahooQuoteSummaryResult = {
  financialData: {
    revenueGrowth: { raw: 0.061, fmt: '6.1%' },
    earningsGrowth: { raw: 0.1 },
    profitMargins: { raw: 0.25 },
    operatingMargins: { raw: 0.3 },
    returnOnEquity: { raw: 1.5 },
    freeCashflow: { raw: 100_000_000_000 },
    operatingCashflow: { raw: 120_000_000_000 },
    debtToEquity: { raw: 150 },
    currentRatio: { raw: 0.9 },
  },
  defaultKeyStatistics: {
    trailingEps: { raw: 6.4 },
    forwardEps: { raw: 7 },
    pegRatio: {},
    priceToBook: { raw: 45 },
    earningsQuarterlyGrowth: {},
  },
  summaryDetail: {
    trailingPE: 28.5,
    dividendYield: { raw: 0.005 },
  },
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Routes session bootstrap and crumb requests; quoteSummary answers come from `quotes`. */
function yahooFetch(quotes: Array<() => Response>): { fetchFn: typeof fetch; urls: string[] } {
  const urls: string[] = [];
  let quoteCall = 0;
  const fetchFn: typeof fetch = async (input) => {
    const url = String(input);
    urls.push(url);
    if (url.startsWith('https://fc.yahoo.com')) return new Response('', { status: 404 });
    if (url.includes('/v1/test/getcrumb')) return new Response('test-crumb');
    const next = quotes[Math.min(quoteCall, quotes.length - 1)];
    quoteCall++;
    return next();
  };
  return { fetchFn, urls };
}

describe('readYahooNumber', () => {
  it('reads raw wrappers and plain numbers', () => {
    expect(readYahooNumber({ raw: 1.25, fmt: '1.25' })).toBe(1.25);
    expect(readYahooNumber(3)).toBe(3);
    expect(readYahooNumber({})).toBeNull();
    expect(readYahooNumber(null)).toBeNull();
    expect(readYahooNumber(undefined)).toBeNull();
  });
});

describe('mapQuoteSummary', () => {
  it('maps the three modules onto the metric names', () => {
    const { metrics, rawFieldCount } = mapQuoteSummary(RESULT);
    expect(metrics).toEqual({
      'Revenue Growth': 0.061,
      EPS: 6.4,
      'Net Profit Margin': 0.25,
      'Operating Margin': 0.3,
      'Return on Equity': 1.5,
      'Earnings Growth Rate': 0.1,
      'Free Cash Flow': 100_000_000_000,
      'Operating Cash Flow': 120_000_000_000,
      'Debt-to-Equity Ratio': 150,
      'Current Ratio': 0.9,
      'P/E Ratio': 28.5,
      'PEG Ratio': null,
      'P/B Ratio': 45,
      'Dividend Yield': 0.005,
    });
    expect(rawFieldCount).toBe(14);
  });

  it('falls back to forward P/E when trailing is missing', () => {
    const { metrics } = mapQuoteSummary({
      summaryDetail: {},
      defaultKeyStatistics: { forwardPE: { raw: 19.2 } },
    });
    expect(metrics['P/E Ratio']).toBe(19.2);
  });
});

describe('YahooQuoteSummaryClient', () => {
  it('fetches with the session crumb', async () => {
    const { fetchFn, urls } = yahooFetch([() => json({ quoteSummary: { result: [RESULT], error: null } })]);
    const client = new YahooQuoteSummaryClient(new YahooSessionManager(fetchFn), fetchFn);

    const payload = await client.getFundamentals('AAPL');
    expect(payload.metrics['P/E Ratio']).toBe(28.5);
    const quoteUrl = urls.find((url) => url.includes('/v10/finance/quoteSummary/AAPL'));
    expect(quoteUrl).toContain('crumb=test-crumb');
    expect(quoteUrl).toContain('modules=financialData,defaultKeyStatistics,summaryDetail');
  });

  it('refreshes the session once after a 401', async () => {
    const { fetchFn, urls } = yahooFetch([
      () => json({}, 401),
      () => json({ quoteSummary: { result: [RESULT] } }),
    ]);
    const client = new YahooQuoteSummaryClient(new YahooSessionManager(fetchFn), fetchFn);

    await expect(client.getFundamentals('MSFT')).resolves.toMatchObject({ rawFieldCount: 14 });
    expect(urls.filter((url) => url.startsWith('https://fc.yahoo.com'))).toHaveLength(2);
  });

  it('classifies throttling as rate_limited', async () => {
    const { fetchFn } = yahooFetch([() => json({}, 429)]);
    const client = new YahooQuoteSummaryClient(new YahooSessionManager(fetchFn), fetchFn);

    const error = await client.getFundamentals('AAPL').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind: 'rate_limited', provider: 'yahoo', symbol: 'AAPL' });
  });

  it('reports an empty result as insufficient and 404s as fatal', async () => {
    const empty = yahooFetch([() => json({ quoteSummary: { result: [] } })]);
    const emptyClient = new YahooQuoteSummaryClient(new YahooSessionManager(empty.fetchFn), empty.fetchFn);
    await expect(emptyClient.getFundamentals('ZZZ')).rejects.toMatchObject({ kind: 'insufficient' });

    const missing = yahooFetch([() => json({}, 404)]);
    const missingClient = new YahooQuoteSummaryClient(
      new YahooSessionManager(missing.fetchFn),
      missing.fetchFn
    );
    await expect(missingClient.getFundamentals('ZZZ')).rejects.toMatchObject({ kind: 'fatal' });
  });

  it('wraps network failures as transient', async () => {
    const fetchFn: typeof fetch = async (input) => {
      if (String(input).includes('quoteSummary')) throw new TypeError('fetch failed');
      return new Response('test-crumb');
    };
    const client = new YahooQuoteSummaryClient(new YahooSessionManager(fetchFn), fetchFn);
    await expect(client.getFundamentals('AAPL')).rejects.toMatchObject({ kind: 'transient' });
  });

  it('gives up on a hung session bootstrap when the fetch times out', async () => {
    const urls: string[] = [];
    // settles only when aborted
    const hangingFetch: typeof fetch = (input, init) => {
      urls.push(String(input));
      const signal = init?.signal;
      return new Promise<Response>((_resolve, reject) => {
        if (signal) {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        }
      });
    };
    const client = new YahooQuoteSummaryClient(new YahooSessionManager(hangingFetch), hangingFetch);

    const started = Date.now();
    const error = await client.getFundamentals('AAPL', AbortSignal.timeout(50)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind: 'transient', symbol: 'AAPL' });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(urls).toEqual(['https://fc.yahoo.com']);
  });

  it('releases a caller waiting on a shared refresh when its own signal aborts', async () => {
    let releaseBootstrap: () => void = () => {};
    const fetchFn: typeof fetch = async (input) => {
      const url = String(input);
      if (url.startsWith('https://fc.yahoo.com')) {
        await new Promise<void>((resolve) => {
          releaseBootstrap = resolve;
        });
        return new Response('', { status: 404 });
      }
      if (url.includes('/v1/test/getcrumb')) return new Response('test-crumb');
      return json({ quoteSummary: { result: [RESULT] } });
    };
    const sessions = new YahooSessionManager(fetchFn);

    const first = sessions.get();
    const controller = new AbortController();
    const second = sessions.get(controller.signal);
    controller.abort(new Error('caller gave up'));

    await expect(second).rejects.toThrow('caller gave up');
    releaseBootstrap();
    await expect(first).resolves.toMatchObject({ crumb: 'test-crumb' });
  });
});
