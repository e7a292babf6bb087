/**
 * KnowledgeSynthesizer - turn a corpus snapshot into instruction/response records
 *
 * Order is fixed: sections, equations, organisms, then the built-in
 * fundamentals. The same snapshot always yields the same records.
 */

import { z } from 'zod';
import type { Equation, KnowledgeRecord, Organism, Section, StrataConfig } from '@strata/core';
import { createConfig } from '@strata/core';
import fundamentalsData from '../data/fundamentals.json';
import type { CorpusSnapshot } from './builder';

const FundamentalSchema = z.object({
  question: z.string(),
  answer: z.string(),
});

export type Fundamental = z.infer<typeof FundamentalSchema>;

export const FUNDAMENTALS: readonly Fundamental[] = z.array(FundamentalSchema).parse(fundamentalsData);

export class KnowledgeSynthesizer {
  private config: Readonly<StrataConfig>;

  constructor(config: Readonly<StrataConfig> = createConfig()) {
    this.config = config;
  }

  synthesize(snapshot: CorpusSnapshot): KnowledgeRecord[] {
    const { sectionMinLength } = this.config.synthesis;

    return [
      ...snapshot.sections
        .filter((s) => s.title.length > 0 && s.content.length > sectionMinLength)
        .map((s) => this.fromSection(s, snapshot.source)),
      ...snapshot.equations.map((e) => this.fromEquation(e)),
      ...snapshot.organisms.map((o) => this.fromOrganism(o)),
      ...FUNDAMENTALS.map((f) => this.fromFundamental(f)),
    ];
  }

  fromSection(section: Section, source: string): KnowledgeRecord {
    const { framework, sectionResponseLength, systemPrompt } = this.config.synthesis;
    return {
      type: 'instruction',
      system: systemPrompt,
      instruction: `Explain ${section.title} in the ${framework}`,
      response: section.content.slice(0, sectionResponseLength),
      metadata: { source, section: section.title },
    };
  }

  fromEquation(equation: Equation): KnowledgeRecord {
    const label = equation.type.replace(/_/g, ' ');
    return {
      type: 'equation',
      system: this.config.synthesis.systemPrompt,
      instruction: `What is the formula for ${label}?`,
      response: `The ${label} is defined as: ${equation.formula}`,
      metadata: { equationId: equation.id, type: equation.type },
    };
  }

  fromOrganism(organism: Organism): KnowledgeRecord {
    const genes = organism.genes.map((g) => g.name).join(', ');
    const excerpt = organism.excerpt.slice(0, this.config.synthesis.organismExcerptLength);
    return {
      type: 'organism',
      system: this.config.synthesis.systemPrompt,
      instruction: `Describe the ${organism.name} organism`,
      response: `ORGANISM ${organism.name} is a DNA-Lang construct with genes: ${genes}. ${excerpt}`,
      metadata: { organism: organism.name, geneCount: organism.genes.length },
    };
  }

  private fromFundamental(fundamental: Fundamental): KnowledgeRecord {
    return {
      type: 'knowledge',
      system: this.config.synthesis.systemPrompt,
      instruction: fundamental.question,
      response: fundamental.answer,
      metadata: { category: 'ccce_fundamentals' },
    };
  }
}
