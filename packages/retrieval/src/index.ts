/**
 * @strata/retrieval - Inverted index, knowledge base loading and ranked retrieval
 */

export { InvertedIndex } from './inverted-index';
export { KnowledgeBase } from './knowledge-base';
export type { LoadOptions } from './knowledge-base';
export { RetrievalEngine } from './engine';
export type { ScoredRecord } from './engine';
export { TokenBudget } from './token-budget';
