/**
 * Inverted index over knowledge records
 *
 * token -> positions, one entry per occurrence, in ascending position order.
 */

import type { KnowledgeRecord, StrataConfig } from '@strata/core';
import { createConfig, tokenize } from '@strata/core';

export class InvertedIndex {
  private postings: Map<string, number[]>;

  private constructor(postings: Map<string, number[]>) {
    this.postings = postings;
  }

  static build(records: readonly KnowledgeRecord[], config: Readonly<StrataConfig> = createConfig()): InvertedIndex {
    const { shortTokenLength } = config.indexing;
    const postings = new Map<string, number[]>();

    records.forEach((record, position) => {
      for (const token of tokenize(`${record.instruction} ${record.response}`, { shortTokenLength })) {
        const list = postings.get(token);
        if (list) {
          list.push(position);
        } else {
          postings.set(token, [position]);
        }
      }
    });

    return new InvertedIndex(postings);
  }

  /** Positions for a token; empty when the token was never indexed */
  lookup(token: string): readonly number[] {
    return this.postings.get(token) ?? [];
  }

  has(token: string): boolean {
    return this.postings.has(token);
  }

  get size(): number {
    return this.postings.size;
  }
}
