/**
 * Bundle export: the full conversion result as JSON, plus the records alone
 * as JSON lines for bulk index loading.
 */

import type { Equation, KnowledgeRecord, Logger, Metric, Organism } from '@strata/core';
import { createLogger } from '@strata/core';
import type { CorpusSnapshot, CorpusStatistics } from './builder';

export const BUNDLE_VERSION = '1.0.0';
export const PLATFORM = 'DNA::}{::lang';

export const CONSTANTS = {
  LAMBDA_PHI: 2.176435e-8,
  THETA_LOCK: 51.843,
  PHI_THRESHOLD: 0.7734,
  GAMMA_FIXED: 0.092,
  CHI_PC: 0.869,
  GOLDEN_RATIO: 1.618033988749895,
} as const;

export interface CorpusBundle {
  metadata: {
    source: string;
    convertedAt: string;
    version: string;
    platform: string;
    constants: typeof CONSTANTS;
  };
  statistics: CorpusStatistics & { trainingPairs: number };
  equations: readonly Equation[];
  metrics: readonly Metric[];
  organisms: readonly Organism[];
  sections: Array<{ title: string; length: number }>;
  trainingData: readonly KnowledgeRecord[];
}

export interface BundleOptions {
  now?: Date;
}

export function buildBundle(
  snapshot: CorpusSnapshot,
  records: readonly KnowledgeRecord[],
  options: BundleOptions = {}
): CorpusBundle {
  const now = options.now ?? new Date();
  return {
    metadata: {
      source: snapshot.source,
      convertedAt: now.toISOString(),
      version: BUNDLE_VERSION,
      platform: PLATFORM,
      constants: CONSTANTS,
    },
    statistics: { ...snapshot.statistics, trainingPairs: records.length },
    equations: snapshot.equations,
    metrics: snapshot.metrics,
    organisms: snapshot.organisms,
    sections: snapshot.sections.map((s) => ({ title: s.title, length: s.content.length })),
    trainingData: records,
  };
}

export function toJsonl(records: readonly unknown[]): string {
  const lines = records.map((entry) => JSON.stringify(entry));
  return lines.join('\n') + (lines.length > 0 ? '\n' : '');
}

/** `out/kb.json` -> `out/kb.jsonl`; any other name gets `.jsonl` appended */
export function jsonlPathFor(outputPath: string): string {
  return outputPath.endsWith('.json') ? `${outputPath}l` : `${outputPath}.jsonl`;
}

export interface WrittenBundle {
  jsonPath: string;
  jsonlPath: string;
}

export async function writeBundle(
  bundle: CorpusBundle,
  outputPath: string,
  logger: Logger = createLogger('Exporter')
): Promise<WrittenBundle> {
  const fs = await import('node:fs/promises');
  const path = await import('node:path');

  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  await fs.writeFile(outputPath, JSON.stringify(bundle, null, 2));
  logger.info(`Wrote ${outputPath}`);

  const jsonlPath = jsonlPathFor(outputPath);
  await fs.writeFile(jsonlPath, toJsonl(bundle.trainingData));
  logger.info(`Wrote ${bundle.trainingData.length} records to ${jsonlPath}`);

  return { jsonPath: outputPath, jsonlPath };
}
