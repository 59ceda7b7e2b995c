/**
 * Scoring oracle adapter.
 * Formats eligible fundamentals into a prompt, calls the oracle once per
 * batch and returns per-symbol scores. Failures yield an empty map.
 */

import { createChildLogger } from '@/utils/logger';
import { isEligibleForScoring } from '@/pipeline/filters';
import type { Fundamentals, ScoreResult } from '@/types/pipeline';
import type { ScoringClient } from './client';
import { buildScoringPrompt, formatFundamentalsBlock, PROMPT_VERSION } from './templates';
import { parseScoreResponseDetailed } from './guardrails';

const logger = createChildLogger('llm_adapter');

export class ScoringOracleAdapter {
  constructor(private readonly client: ScoringClient) {}

  async score(entries: Fundamentals[]): Promise<Map<string, ScoreResult>> {
    const eligible = entries.filter(isEligibleForScoring);
    if (eligible.length < entries.length) {
      logger.debug(
        { dropped: entries.length - eligible.length },
        'Ineligible records withheld from scoring'
      );
    }
    if (eligible.length === 0) {
      return new Map();
    }

    return this.scoreBlock(
      formatFundamentalsBlock(eligible),
      eligible.map((entry) => entry.symbol)
    );
  }

  async scoreBlock(block: string, symbols: string[]): Promise<Map<string, ScoreResult>> {
    let reply: string;
    try {
      reply = await this.client.complete(buildScoringPrompt(block));
    } catch (error) {
      logger.error(
        { symbols: symbols.length, error: error instanceof Error ? error.message : String(error) },
        'Scoring call failed'
      );
      return new Map();
    }

    const { scores, mode } = parseScoreResponseDetailed(reply, symbols);
    logger.info(
      { requested: symbols.length, scored: scores.size, mode, promptVersion: PROMPT_VERSION },
      'Scoring reply parsed'
    );
    return scores;
  }
}
