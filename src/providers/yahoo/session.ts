/**
 * Cookie + crumb session required by the quoteSummary endpoint
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('yahoo_session');

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36';
export const ACCEPT_LANGUAGE = 'en-US,en;q=0.9';

const SESSION_TTL_MS = 45 * 60 * 1000;

export interface YahooSession {
  cookie: string;
  crumb: string | null;
  expiresAt: number;
}

export function collectCookies(response: Response, previous: string = ''): string {
  const jar = new Map<string, string>();
  for (const part of previous.split('; ').filter(Boolean)) {
    const index = part.indexOf('=');
    if (index > 0) jar.set(part.slice(0, index), part);
  }
  for (const header of response.headers.getSetCookie()) {
    const pair = header.split(';')[0]?.trim();
    const index = pair ? pair.indexOf('=') : -1;
    if (pair && index > 0) jar.set(pair.slice(0, index), pair);
  }
  return Array.from(jar.values()).join('; ');
}

function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class YahooSessionManager {
  private session: YahooSession | null = null;
  private pending: Promise<YahooSession> | null = null;

  constructor(private readonly fetchFn: typeof fetch = fetch) {}

  /** Rejects with the signal's reason once it aborts, even while sharing another caller's refresh. */
  async get(signal?: AbortSignal): Promise<YahooSession> {
    if (this.session && this.session.expiresAt > Date.now()) {
      return this.session;
    }
    // concurrent callers share one refresh
    if (!this.pending) {
      this.pending = this.refresh(signal).finally(() => {
        this.pending = null;
      });
    }
    return untilAborted(this.pending, signal);
  }

  invalidate(): void {
    this.session = null;
  }

  private async refresh(signal?: AbortSignal): Promise<YahooSession> {
    const headers = { 'User-Agent': USER_AGENT, 'Accept-Language': ACCEPT_LANGUAGE };

    const bootstrap = await this.fetchFn('https://fc.yahoo.com', { headers, redirect: 'manual', signal });
    const cookie = collectCookies(bootstrap);

    let crumb: string | null = null;
    for (const host of ['query2', 'query1']) {
      const response = await this.fetchFn(`https://${host}.finance.yahoo.com/v1/test/getcrumb`, {
        headers: { ...headers, Cookie: cookie },
        signal,
      });
      if (response.ok) {
        const text = (await response.text()).trim();
        if (text && text !== 'Unauthorized') {
          crumb = text;
          break;
        }
      }
    }

    if (!crumb) {
      logger.warn('No crumb issued, continuing with cookie only');
    }

    this.session = { cookie, crumb, expiresAt: Date.now() + SESSION_TTL_MS };
    return this.session;
  }
}
