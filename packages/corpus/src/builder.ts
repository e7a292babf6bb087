/**
 * CorpusBuilder - one extraction pass over one corpus
 *
 * Produces a frozen snapshot: equations, organisms and sections in first-seen
 * order, metrics deduplicated by symbol, and aggregate statistics.
 */

import { basename } from 'node:path';
import type { Equation, Logger, Metric, Organism, Section, StrataConfig } from '@strata/core';
import { IdSequence, countOccurrences, createConfig, createLogger } from '@strata/core';
import { Extractor, dedupeMetrics } from '@strata/extract';
import { readCorpusFile } from './reader';

export interface CorpusStatistics {
  totalLines: number;
  totalChars: number;
  equationsExtracted: number;
  /** Count before deduplication */
  metricsExtracted: number;
  organismsExtracted: number;
  sectionsExtracted: number;
}

export interface CorpusSnapshot {
  readonly source: string;
  readonly equations: readonly Equation[];
  readonly metrics: readonly Metric[];
  readonly organisms: readonly Organism[];
  readonly sections: readonly Section[];
  readonly statistics: Readonly<CorpusStatistics>;
}

export class CorpusBuilder {
  private config: Readonly<StrataConfig>;
  private logger: Logger;
  private extractor: Extractor;

  constructor(config: Readonly<StrataConfig> = createConfig(), logger?: Logger) {
    this.config = config;
    this.logger = logger ?? createLogger('CorpusBuilder', config.logLevel);
    this.extractor = new Extractor(config, this.logger);
  }

  build(text: string, source: string = this.config.synthesis.source): CorpusSnapshot {
    // Fresh per build: identical input always yields identical ids
    const ids = new IdSequence();

    const equations = this.timed('equations', () => this.extractor.extractEquations(text, ids));
    const rawMetrics = this.timed('metrics', () => this.extractor.extractMetrics(text));
    const organisms = this.timed('organisms', () => this.extractor.extractOrganisms(text));
    const sections = this.timed('sections', () => this.extractor.extractSections(text));

    const statistics: CorpusStatistics = {
      totalLines: countOccurrences(text, '\n'),
      totalChars: text.length,
      equationsExtracted: equations.length,
      metricsExtracted: rawMetrics.length,
      organismsExtracted: organisms.length,
      sectionsExtracted: sections.length,
    };

    return Object.freeze({
      source,
      equations: Object.freeze(equations),
      metrics: Object.freeze(dedupeMetrics(rawMetrics)),
      organisms: Object.freeze(organisms),
      sections: Object.freeze(sections),
      statistics: Object.freeze(statistics),
    });
  }

  /** Throws CorpusReadError when the file cannot be read */
  buildFromFile(path: string): CorpusSnapshot {
    this.logger.info(`Reading ${path}`);
    return this.build(readCorpusFile(path), basename(path));
  }

  private timed<T extends readonly unknown[]>(category: string, run: () => T): T {
    const start = Date.now();
    const result = run();
    this.logger.info(`Extracted ${result.length} ${category}`);
    this.logger.debug(`${category} took ${Date.now() - start}ms`);
    return result;
  }
}
