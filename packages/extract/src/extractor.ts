/**
 * Extractor - pattern-driven structural parser
 *
 * Runs the four independent stages over one corpus:
 * EQUATIONS, METRICS, ORGANISMS, SECTIONS
 */

import type {
  Equation,
  ExtractionResult,
  Logger,
  Metric,
  Organism,
  Section,
  StrataConfig,
} from '@strata/core';
import { IdSequence, createConfig, createLogger } from '@strata/core';

import { extractEquations } from './stages/equations';
import { extractMetrics } from './stages/metrics';
import { extractOrganisms } from './stages/organisms';
import { extractSections } from './stages/sections';

export class Extractor {
  private config: Readonly<StrataConfig>;
  private logger: Logger;

  constructor(config: Readonly<StrataConfig> = createConfig(), logger?: Logger) {
    this.config = config;
    this.logger = logger ?? createLogger('Extractor', config.logLevel);
  }

  /**
   * @param ids - symbolic equation id source; a fresh one per call when omitted
   */
  extractEquations(text: string, ids: IdSequence = new IdSequence()): Equation[] {
    return extractEquations(text, ids);
  }

  extractMetrics(text: string): Metric[] {
    return extractMetrics(text, this.logger);
  }

  extractOrganisms(text: string): Organism[] {
    return extractOrganisms(text, { excerptLength: this.config.extraction.excerptLength });
  }

  extractSections(text: string): Section[] {
    return extractSections(text, {
      maxLength: this.config.extraction.sectionMaxLength,
      minLength: this.config.extraction.sectionMinLength,
    });
  }

  extract(text: string, ids: IdSequence = new IdSequence()): ExtractionResult {
    return {
      equations: this.extractEquations(text, ids),
      metrics: this.extractMetrics(text),
      organisms: this.extractOrganisms(text),
      sections: this.extractSections(text),
    };
  }
}
