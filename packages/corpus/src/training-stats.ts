/**
 * Size and example counts for training data files
 */

import type { Logger } from '@strata/core';
import { silentLogger } from '@strata/core';

export interface TrainingFileStats {
  path: string;
  name: string;
  bytes: number;
  /** null when the file could not be read or parsed */
  examples: number | null;
}

export interface TrainingStatsSummary {
  files: TrainingFileStats[];
  totalBytes: number;
  totalExamples: number;
}

export function countExamples(fileName: string, content: string): number {
  if (fileName.endsWith('.jsonl')) {
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines.length;
  }

  const data: unknown = JSON.parse(content);
  if (Array.isArray(data)) return data.length;
  if (typeof data === 'object' && data !== null && 'conversations' in data && Array.isArray(data.conversations)) {
    return data.conversations.length;
  }
  return 1;
}

export async function summarizeTrainingFiles(
  paths: readonly string[],
  logger: Logger = silentLogger
): Promise<TrainingStatsSummary> {
  const fs = await import('node:fs/promises');
  const path = await import('node:path');

  const files: TrainingFileStats[] = [];
  for (const filePath of [...paths].sort()) {
    const name = path.basename(filePath);
    let bytes = 0;
    let examples: number | null = null;

    try {
      bytes = (await fs.stat(filePath)).size;
      examples = countExamples(name, await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      logger.warn(`Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    files.push({ path: filePath, name, bytes, examples });
  }

  return {
    files,
    totalBytes: files.reduce((sum, f) => sum + f.bytes, 0),
    totalExamples: files.reduce((sum, f) => sum + (f.examples ?? 0), 0),
  };
}

export function formatTrainingStats(summary: TrainingStatsSummary): string {
  const mb = (bytes: number) => (bytes / 1024 / 1024).toFixed(1).padStart(6);
  const rows = summary.files.map((f) => {
    const count = f.examples === null ? '?????' : String(f.examples).padStart(5);
    return `${f.name.slice(0, 40).padEnd(40)} ${mb(f.bytes)}MB  ${count} ex`;
  });
  rows.push(`TOTAL: ${mb(summary.totalBytes)}MB  ${String(summary.totalExamples).padStart(5)} examples`);
  return rows.join('\n');
}
