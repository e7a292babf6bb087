/**
 * KnowledgeBase - records plus their inverted index
 *
 * Loaded once, then read-only. Index positions are positions in `entries`.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { KnowledgeRecord, Logger, StrataConfig } from '@strata/core';
import { KnowledgeRecordSchema, createConfig, createLogger } from '@strata/core';
import { InvertedIndex } from './inverted-index';

export interface LoadOptions {
  config?: Readonly<StrataConfig>;
  logger?: Logger;
}

export class KnowledgeBase {
  readonly entries: readonly KnowledgeRecord[];
  readonly index: InvertedIndex;

  private constructor(entries: readonly KnowledgeRecord[], index: InvertedIndex) {
    this.entries = entries;
    this.index = index;
  }

  static fromRecords(records: readonly KnowledgeRecord[], config: Readonly<StrataConfig> = createConfig()): KnowledgeBase {
    const entries = Object.freeze([...records]);
    return new KnowledgeBase(entries, InvertedIndex.build(entries, config));
  }

  /** Blank and malformed lines are skipped one by one */
  static fromJsonl(text: string, options: LoadOptions = {}): KnowledgeBase {
    const config = options.config ?? createConfig();
    const logger = options.logger ?? createLogger('KnowledgeBase', config.logLevel);

    const records: KnowledgeRecord[] = [];
    let skipped = 0;

    for (const line of text.split('\n')) {
      if (line.trim() === '') continue;

      const parsed = KnowledgeRecordSchema.safeParse(parseJson(line));
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed record line(s)`);
    }
    logger.info(`Loaded ${records.length} records`);

    return KnowledgeBase.fromRecords(records, config);
  }

  /** A missing file yields an empty knowledge base */
  static fromFile(path: string, options: LoadOptions = {}): KnowledgeBase {
    const config = options.config ?? createConfig();
    const logger = options.logger ?? createLogger('KnowledgeBase', config.logLevel);

    if (!existsSync(path)) {
      logger.warn(`Knowledge base not found: ${path}`);
      return KnowledgeBase.fromRecords([], config);
    }

    return KnowledgeBase.fromJsonl(readFileSync(path, 'utf-8'), { config, logger });
  }

  get size(): number {
    return this.entries.length;
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
