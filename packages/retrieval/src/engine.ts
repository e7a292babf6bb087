/**
 * RetrievalEngine - ranked search and budget-bounded context assembly
 */

import type { KnowledgeRecord, Logger, StrataConfig } from '@strata/core';
import { createConfig, createLogger, tokenize } from '@strata/core';
import type { KnowledgeBase } from './knowledge-base';
import { TokenBudget } from './token-budget';

export interface ScoredRecord {
  position: number;
  score: number;
  record: KnowledgeRecord;
}

export class RetrievalEngine {
  private knowledgeBase: KnowledgeBase;
  private config: Readonly<StrataConfig>;
  private logger: Logger;

  constructor(knowledgeBase: KnowledgeBase, config: Readonly<StrataConfig> = createConfig(), logger?: Logger) {
    this.knowledgeBase = knowledgeBase;
    this.config = config;
    this.logger = logger ?? createLogger('Retrieval', config.logLevel);
  }

  /**
   * Every posting entry of every query token adds 1 to its record.
   * Query tokens are not length-filtered; short ones simply never match.
   */
  searchScored(query: string, topK: number = this.config.retrieval.defaultTopK): ScoredRecord[] {
    const { index, entries } = this.knowledgeBase;
    const scores = new Map<number, number>();

    for (const token of tokenize(query)) {
      for (const position of index.lookup(token)) {
        scores.set(position, (scores.get(position) ?? 0) + 1);
      }
    }

    const ranked = [...scores.entries()]
      .sort(([posA, scoreA], [posB, scoreB]) => scoreB - scoreA || posA - posB)
      .slice(0, Math.max(0, topK));

    this.logger.debug(`"${query}" matched ${scores.size} records`);

    return ranked.map(([position, score]) => ({ position, score, record: entries[position] }));
  }

  search(query: string, topK: number = this.config.retrieval.defaultTopK): KnowledgeRecord[] {
    return this.searchScored(query, topK).map((r) => r.record);
  }

  /**
   * Packs Q/A blocks in rank order and stops at the first block that would
   * reach the budget, even if a later, smaller block would fit.
   */
  getContext(query: string, tokenBudget: number = this.config.retrieval.defaultTokenBudget): string {
    const { contextTopK, charsPerToken } = this.config.retrieval;
    const budget = new TokenBudget(tokenBudget, charsPerToken);

    const parts: string[] = [];
    let used = 0;

    for (const record of this.search(query, contextTopK)) {
      const block = `Q: ${record.instruction}\nA: ${record.response}\n\n`;
      if (!budget.fits(used, block)) break;
      parts.push(block);
      used += block.length;
    }

    this.logger.debug(`Context for "${query}": ${parts.length} blocks, ~${budget.estimateTokens(parts.join(''))} tokens`);
    return parts.join('');
  }
}
