export interface TokenizerConfig {
  lowercase: boolean;
  /** Tokens of this length or shorter are dropped; 0 keeps everything */
  shortTokenLength: number;
}

const DEFAULT_CONFIG: TokenizerConfig = {
  lowercase: true,
  shortTokenLength: 0,
};

/**
 * Splits text on whitespace into word tokens.
 *
 * Punctuation stays attached to the word ("coherence," and "coherence" are
 * different tokens), so queries and documents must be tokenized the same way
 * apart from the length filter.
 */
export function tokenize(text: string, config?: Partial<TokenizerConfig>): string[] {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const processed = cfg.lowercase ? text.toLowerCase() : text;

  return processed
    .split(/\s+/)
    .filter((token) => token.length > 0 && token.length > cfg.shortTokenLength);
}
