/**
 * Character budget for context assembly, expressed in estimated tokens
 */
export class TokenBudget {
  private maxTokens: number;
  private charsPerToken: number;

  constructor(maxTokens: number = 2000, charsPerToken: number = 4) {
    this.maxTokens = maxTokens;
    this.charsPerToken = charsPerToken;
  }

  estimateTokens(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }

  get charLimit(): number {
    return this.maxTokens * this.charsPerToken;
  }

  /** True while `usedChars` plus the block stays strictly under the limit */
  fits(usedChars: number, block: string): boolean {
    return usedChars + block.length < this.charLimit;
  }
}
