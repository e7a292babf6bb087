/**
 * METRICS Stage
 *
 * "Φ=0.70", "lambda: 0.85", "Γ_ = 0.09" -> Metric records.
 * Values that are not a clean decimal ("1.2.3", ".") are dropped.
 */

import type { Logger, Metric } from '@strata/core';
import { silentLogger } from '@strata/core';
import { resolveMetricSymbol } from '../symbols';

// The trailing lookahead stops "0.7" matching inside "0.75" or "0.7.1"
const METRIC_PATTERN = /(Φ|Λ|Γ|Ξ|phi|lambda|gamma|xi)[_\s]*[=:]\s*([\d.]+)(?![.\d])/gi;

export const METRIC_DOMAIN = 'ccce';

export function parseDecimal(literal: string): number | null {
  if (!/^(?:\d+\.?\d*|\.\d+)$/.test(literal)) return null;
  const value = Number(literal);
  return Number.isFinite(value) ? value : null;
}

export function extractMetrics(text: string, logger: Logger = silentLogger): Metric[] {
  const metrics: Metric[] = [];

  for (const match of text.matchAll(METRIC_PATTERN)) {
    const value = parseDecimal(match[2]);
    if (value === null) {
      logger.debug(`Skipping malformed metric value "${match[2]}" at offset ${match.index ?? -1}`);
      continue;
    }

    const { symbol, name } = resolveMetricSymbol(match[1]);
    metrics.push({ symbol, name, value, domain: METRIC_DOMAIN });
  }

  return metrics;
}

/**
 * One metric per symbol; a later value replaces an earlier one but the symbol
 * keeps the slot of its first appearance.
 */
export function dedupeMetrics(metrics: readonly Metric[]): Metric[] {
  const bySymbol = new Map<string, Metric>();
  for (const metric of metrics) {
    bySymbol.set(metric.symbol, metric);
  }
  return [...bySymbol.values()];
}
