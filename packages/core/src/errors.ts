/**
 * Error types surfaced to callers
 */

/** The corpus source could not be read. Fatal to extraction, never retried. */
export class CorpusReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read corpus ${path}: ${reason}`, { cause });
    this.name = 'CorpusReadError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
