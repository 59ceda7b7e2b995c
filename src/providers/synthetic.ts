/**
 * Deterministic placeholder fundamentals, used when both live sources fail.
 * The same ticker always produces the same numbers.
 */

import { createSeededRandom, deterministicSeed, seededUniform } from '@/core/seed';
import { emptyMetrics, type Fundamentals } from '@/types/pipeline';

interface KnownProfile {
  pe: number;
  growth: number;
  eps: number;
}

const KNOWN_PROFILES: Record<string, KnownProfile> = {
  AAPL: { pe: 28.5, growth: 0.08, eps: 6.43 },
  MSFT: { pe: 32.1, growth: 0.12, eps: 9.27 },
  GOOGL: { pe: 24.8, growth: 0.15, eps: 5.61 },
  AMZN: { pe: 45.2, growth: 0.09, eps: 3.31 },
  TSLA: { pe: 67.3, growth: 0.25, eps: 4.93 },
};

export function syntheticFundamentals(symbol: string): Fundamentals {
  const random = createSeededRandom(deterministicSeed(symbol, 'synthetic-fundamentals'));
  const known = KNOWN_PROFILES[symbol];

  const pe = seededUniform(random, 15, 50, 1);
  const growth = seededUniform(random, 0.02, 0.2, 3);
  const eps = seededUniform(random, 1, 10, 2);

  const metrics = emptyMetrics();
  metrics['P/E Ratio'] = known?.pe ?? pe;
  metrics['Revenue Growth'] = known?.growth ?? growth;
  metrics['Earnings Growth Rate'] = known?.growth ?? growth;
  metrics.EPS = known?.eps ?? eps;
  metrics['Net Profit Margin'] = seededUniform(random, 0.05, 0.25, 3);
  metrics['Return on Equity'] = seededUniform(random, 0.1, 0.35, 3);
  metrics['Current Ratio'] = seededUniform(random, 1, 3, 2);
  metrics['Debt-to-Equity Ratio'] = seededUniform(random, 0.1, 2, 2);

  return { symbol, provenance: 'synthetic', metrics };
}
