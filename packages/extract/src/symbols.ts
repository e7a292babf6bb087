/**
 * CCCE metric symbols
 *
 * The symbol is kept as written (upper-cased), so `PHI` and `Φ` are distinct
 * metrics; only the name is shared.
 */

import type { MetricName } from '@strata/core';

export const METRIC_NAMES: Readonly<Record<string, MetricName>> = {
  'Φ': 'consciousness',
  PHI: 'consciousness',
  'Λ': 'coherence',
  LAMBDA: 'coherence',
  'Γ': 'decoherence',
  GAMMA: 'decoherence',
  'Ξ': 'efficiency',
  XI: 'efficiency',
};

export interface ResolvedSymbol {
  symbol: string;
  name: MetricName;
}

/** Symbols outside the table are tagged unknown */
export function resolveMetricSymbol(raw: string): ResolvedSymbol {
  const symbol = raw.toUpperCase();
  return { symbol, name: METRIC_NAMES[symbol] ?? 'unknown' };
}
