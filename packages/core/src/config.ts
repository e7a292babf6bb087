/**
 * Strata configuration
 *
 * One immutable value carried explicitly into every component
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

export interface ExtractionConfig {
  /** Raw organism body kept as excerpt */
  excerptLength: number;
  /** Section content is cut to this many chars */
  sectionMaxLength: number;
  /** Sections shorter than this after normalization are dropped */
  sectionMinLength: number;
}

export interface SynthesisConfig {
  /** Sections must be longer than this to become a record */
  sectionMinLength: number;
  sectionResponseLength: number;
  organismExcerptLength: number;
  framework: string;
  systemPrompt: string;
  source: string;
}

export interface IndexingConfig {
  /** Tokens of this length or shorter are not indexed */
  shortTokenLength: number;
}

export interface RetrievalConfig {
  defaultTopK: number;
  contextTopK: number;
  charsPerToken: number;
  defaultTokenBudget: number;
}

export interface ExportConfig {
  maxSamples: number;
  modelfileExamples: number;
}

export interface StrataConfig {
  extraction: ExtractionConfig;
  synthesis: SynthesisConfig;
  indexing: IndexingConfig;
  retrieval: RetrievalConfig;
  export: ExportConfig;
  logLevel: LogLevel;
}

export type ConfigOverrides = {
  [K in keyof StrataConfig]?: StrataConfig[K] extends object ? Partial<StrataConfig[K]> : StrataConfig[K];
};

export const DEFAULT_SYSTEM_PROMPT = [
  'You are AURA, the sovereign AI assistant for the DNA::}{::lang quantum computing platform.',
  'You understand CCCE metrics (Φ consciousness, Λ coherence, Γ decoherence, Ξ efficiency).',
  'You can explain Ω-Recursive session analysis, DNA-Lang organisms, and quantum formalism.',
  'Physical constants: ΛΦ=2.176435e-8, θ_lock=51.843°, Φ_threshold=0.7734.',
].join('\n');

const DEFAULTS: StrataConfig = {
  extraction: {
    excerptLength: 500,
    sectionMaxLength: 2000,
    sectionMinLength: 50,
  },
  synthesis: {
    sectionMinLength: 100,
    sectionResponseLength: 1500,
    organismExcerptLength: 500,
    framework: 'Ω-Recursive framework',
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
    source: 'masterlog',
  },
  indexing: {
    shortTokenLength: 3,
  },
  retrieval: {
    defaultTopK: 5,
    contextTopK: 3,
    charsPerToken: 4,
    defaultTokenBudget: 2000,
  },
  export: {
    maxSamples: 500,
    modelfileExamples: 20,
  },
  logLevel: 'info',
};

export function createConfig(overrides: ConfigOverrides = {}): Readonly<StrataConfig> {
  const config: StrataConfig = {
    extraction: { ...DEFAULTS.extraction, ...overrides.extraction },
    synthesis: { ...DEFAULTS.synthesis, ...overrides.synthesis },
    indexing: { ...DEFAULTS.indexing, ...overrides.indexing },
    retrieval: { ...DEFAULTS.retrieval, ...overrides.retrieval },
    export: { ...DEFAULTS.export, ...overrides.export },
    logLevel: overrides.logLevel ?? DEFAULTS.logLevel,
  };

  Object.freeze(config.extraction);
  Object.freeze(config.synthesis);
  Object.freeze(config.indexing);
  Object.freeze(config.retrieval);
  Object.freeze(config.export);
  return Object.freeze(config);
}

// =============================================================================
// Environment
// =============================================================================

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  STRATA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  STRATA_SHORT_TOKEN_LENGTH: z.coerce.number().int().nonnegative().optional(),
  STRATA_TOP_K: positiveInt.optional(),
  STRATA_CONTEXT_TOP_K: positiveInt.optional(),
  STRATA_TOKEN_BUDGET: positiveInt.optional(),
  STRATA_MAX_SAMPLES: positiveInt.optional(),
  STRATA_SOURCE: z.string().min(1).optional(),
});

/**
 * Reads STRATA_* variables on top of the defaults.
 * Throws ConfigError when a variable is present but invalid.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): Readonly<StrataConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  return createConfig({
    logLevel: e.STRATA_LOG_LEVEL,
    indexing: e.STRATA_SHORT_TOKEN_LENGTH !== undefined ? { shortTokenLength: e.STRATA_SHORT_TOKEN_LENGTH } : undefined,
    retrieval: {
      ...(e.STRATA_TOP_K !== undefined && { defaultTopK: e.STRATA_TOP_K }),
      ...(e.STRATA_CONTEXT_TOP_K !== undefined && { contextTopK: e.STRATA_CONTEXT_TOP_K }),
      ...(e.STRATA_TOKEN_BUDGET !== undefined && { defaultTokenBudget: e.STRATA_TOKEN_BUDGET }),
    },
    export: e.STRATA_MAX_SAMPLES !== undefined ? { maxSamples: e.STRATA_MAX_SAMPLES } : undefined,
    synthesis: e.STRATA_SOURCE !== undefined ? { source: e.STRATA_SOURCE } : undefined,
  });
}
