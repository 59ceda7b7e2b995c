/**
 * Scoring reply guardrails.
 * Parses the oracle's text into score results and discards anything that
 * was not asked for.
 */

import { validateScoreResponse } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { ScoreResult } from '@/types/pipeline';

const logger = createChildLogger('llm_guardrails');

export const MIN_BUY_SCORE = 0;
export const MAX_BUY_SCORE = 10;

export type ParseMode = 'structured' | 'lenient' | 'brace_scan' | 'failed';

export interface ParsedScores {
  scores: Map<string, ScoreResult>;
  mode: ParseMode;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Substring from the first `{` to the last `}`, or null. */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

export function normalizeBuyScore(value: unknown): number {
  const numeric =
    typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isFinite(numeric)) return 0;
  return Math.min(MAX_BUY_SCORE, Math.max(MIN_BUY_SCORE, Math.round(numeric)));
}

export function normalizeReasons(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function collectScores(data: unknown, requestedSymbols: string[]): Map<string, ScoreResult> {
  const scores = new Map<string, ScoreResult>();
  if (!isRecord(data)) return scores;

  const requested = new Map(requestedSymbols.map((symbol) => [symbol.toUpperCase(), symbol]));
  const unexpected: string[] = [];

  for (const [key, entry] of Object.entries(data)) {
    const symbol = requested.get(key.trim().toUpperCase());
    if (!symbol) {
      unexpected.push(key);
      continue;
    }
    if (!isRecord(entry) || scores.has(symbol)) continue;
    scores.set(symbol, {
      buyScore: normalizeBuyScore(entry.BuyScore),
      reasons: normalizeReasons(entry.ReasonsToBuy),
    });
  }

  if (unexpected.length > 0) {
    logger.warn({ unexpected }, 'Discarding scores for symbols that were not requested');
  }
  return scores;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export function parseScoreResponseDetailed(text: string, requestedSymbols: string[]): ParsedScores {
  const trimmed = text.trim();

  const strict = tryParse(trimmed);
  if (strict.ok && isRecord(strict.value)) {
    const validation = validateScoreResponse(strict.value);
    if (!validation.valid) {
      logger.debug({ errors: validation.errors }, 'Reply is JSON but not schema-conformant');
    }
    return {
      scores: collectScores(strict.value, requestedSymbols),
      mode: validation.valid ? 'structured' : 'lenient',
    };
  }

  const candidate = extractJsonObject(trimmed);
  if (candidate === null) {
    logger.warn({ length: trimmed.length }, 'Scoring reply contains no JSON object');
    return { scores: new Map(), mode: 'failed' };
  }

  const scanned = tryParse(candidate);
  if (!scanned.ok) {
    logger.warn({ length: candidate.length }, 'Scoring reply JSON could not be parsed');
    return { scores: new Map(), mode: 'failed' };
  }

  return { scores: collectScores(scanned.value, requestedSymbols), mode: 'brace_scan' };
}

export function parseScoreResponse(text: string, requestedSymbols: string[]): Map<string, ScoreResult> {
  return parseScoreResponseDetailed(text, requestedSymbols).scores;
}
