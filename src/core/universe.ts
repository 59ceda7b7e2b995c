/**
 * Universe management - resolves the list of stocks a run analyses
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validateUniverseFile } from '@/validation/ajv_instance';
import { DEFAULT_SECTOR, type StockRecord } from '@/types/pipeline';
import type { WireStockRecord } from '@/types/contracts';
import { InputError, errorMessage } from './errors';

const logger = createChildLogger('universe');

export const DEFAULT_TEST_SYMBOLS = ['AAPL', 'MSFT', 'GOOGL', 'AMZN', 'TSLA'];
export const TEST_SECTOR = 'Technology';
export const SP500_WIKIPEDIA_URL = 'https://en.wikipedia.org/wiki/List_of_S%26P_500_companies';

const UNIVERSE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/i;

export interface UniverseFileV1 {
  name: string;
  description?: string;
  stocks: WireStockRecord[];
}

export interface UniverseDescriptor {
  stocks?: WireStockRecord[];
  universe?: string;
  testMode?: boolean;
  testSymbols?: string[];
}

export interface UniverseLoaderOptions {
  projectRoot?: string;
  fetchFn?: typeof fetch;
  wikipediaUrl?: string;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Trims and upper-cases symbols, defaults missing sectors, and keeps the
 * first occurrence of a duplicated symbol.
 */
export function normalizeStockRecords(records: ReadonlyArray<WireStockRecord>): StockRecord[] {
  const seen = new Set<string>();
  const normalized: StockRecord[] = [];

  for (const record of records) {
    const symbol = normalizeSymbol(record.Symbol);
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    const sector = record.Sector?.trim();
    normalized.push({ symbol, sector: sector ? sector : DEFAULT_SECTOR });
  }

  return normalized;
}

export function toWireStockRecords(stocks: ReadonlyArray<StockRecord>): WireStockRecord[] {
  return stocks.map((stock) => ({ Symbol: stock.symbol, Sector: stock.sector }));
}

export function loadNamedUniverse(name: string, projectRoot: string = process.cwd()): StockRecord[] {
  if (!UNIVERSE_NAME_PATTERN.test(name)) {
    throw new InputError(`Invalid universe name: ${name}`);
  }

  const filePath = join(projectRoot, 'config', 'universes', `${name}.json`);
  if (!existsSync(filePath)) {
    throw new InputError(`Universe not found: ${name}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new InputError(`Universe file is not valid JSON: ${filePath}`, { cause: error });
  }

  const result = validateUniverseFile(raw);
  if (!result.valid || !result.data) {
    throw new InputError(`Invalid universe file ${filePath}: ${(result.errors ?? []).join('; ')}`);
  }

  return normalizeStockRecords(result.data.stocks);
}

function decodeHtml(text: string): string {
  return text
    .replace(/&amp;/g, '&')
    .replace(/&nbsp;/g, ' ')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .trim();
}

function stripTags(html: string): string {
  return decodeHtml(html.replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim();
}

/**
 * Reads the constituents table of the S&P 500 list page. Class-share
 * tickers use the dash form the quote API expects (BRK.B -> BRK-B).
 */
export function parseWikipediaConstituents(html: string): StockRecord[] {
  const tables = Array.from(
    html.matchAll(/<table[^>]*class="[^"]*wikitable[^"]*"[^>]*>([\s\S]*?)<\/table>/gi)
  );

  for (const match of tables) {
    const rows = Array.from(match[1].matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi)).map((row) =>
      Array.from(row[1].matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi)).map((cell) =>
        stripTags(cell[1])
      )
    );
    if (rows.length <= 1) continue;

    const header = rows[0].map((cell) => cell.toLowerCase());
    const symbolIndex = header.findIndex((cell) => cell === 'symbol' || cell === 'ticker');
    if (symbolIndex === -1) continue;
    const sectorIndex = header.findIndex((cell) => cell.includes('sector'));

    const records: WireStockRecord[] = [];
    for (const row of rows.slice(1)) {
      const symbol = row[symbolIndex]?.replace(/\./g, '-');
      if (!symbol) continue;
      records.push({
        Symbol: symbol,
        Sector: sectorIndex >= 0 ? row[sectorIndex] : undefined,
      });
    }
    return normalizeStockRecords(records);
  }

  return [];
}

export async function fetchWikipediaUniverse(
  fetchFn: typeof fetch = fetch,
  url: string = SP500_WIKIPEDIA_URL
): Promise<StockRecord[]> {
  logger.info({ url }, 'Fetching constituents list');
  const response = await fetchFn(url);
  if (!response.ok) {
    throw new Error(`Constituents page request failed: ${response.status} ${response.statusText}`);
  }
  const stocks = parseWikipediaConstituents(await response.text());
  logger.info({ count: stocks.length }, 'Loaded constituents');
  return stocks;
}

export async function loadUniverse(
  descriptor: UniverseDescriptor,
  options: UniverseLoaderOptions = {}
): Promise<StockRecord[]> {
  if (descriptor.testMode) {
    const symbols =
      descriptor.testSymbols && descriptor.testSymbols.length > 0
        ? descriptor.testSymbols
        : DEFAULT_TEST_SYMBOLS;
    return normalizeStockRecords(symbols.map((symbol) => ({ Symbol: symbol, Sector: TEST_SECTOR })));
  }

  if (descriptor.stocks) {
    const stocks = normalizeStockRecords(descriptor.stocks);
    if (stocks.length === 0) {
      throw new InputError('Universe contains no valid stock records');
    }
    return stocks;
  }

  if (descriptor.universe) {
    const stocks = loadNamedUniverse(descriptor.universe, options.projectRoot);
    if (stocks.length === 0) {
      throw new InputError(`Universe ${descriptor.universe} contains no stocks`);
    }
    return stocks;
  }

  try {
    const stocks = await fetchWikipediaUniverse(options.fetchFn, options.wikipediaUrl);
    if (stocks.length === 0) {
      throw new Error('No constituents table found');
    }
    return stocks;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Constituents fetch failed');
    throw new InputError('No universe supplied and the constituents fetch failed', {
      cause: error,
    });
  }
}
