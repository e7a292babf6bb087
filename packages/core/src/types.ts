/**
 * Core record types for Strata
 */

import { z } from 'zod';

// =============================================================================
// Equations
// =============================================================================

export const EquationTypeSchema = z.enum([
  'numbered',
  'session_functional',
  'ccce_metric',
  'tensor_definition',
  'resource_matrix',
  'effort_functional',
  'capability_tensor',
  'readiness_score',
]);

export type EquationType = z.infer<typeof EquationTypeSchema>;

/** Equation types matched by symbol rather than by a leading number */
export type SymbolicEquationType = Exclude<EquationType, 'numbered'>;

export const EquationSchema = z.object({
  id: z.string(),
  formula: z.string(),
  type: EquationTypeSchema,
});

export type Equation = Readonly<z.infer<typeof EquationSchema>>;

// =============================================================================
// Metrics
// =============================================================================

export const MetricNameSchema = z.enum([
  'consciousness',
  'coherence',
  'decoherence',
  'efficiency',
  'unknown',
]);

export type MetricName = z.infer<typeof MetricNameSchema>;

export const MetricSchema = z.object({
  symbol: z.string(),
  name: MetricNameSchema,
  value: z.number(),
  domain: z.string(),
});

export type Metric = Readonly<z.infer<typeof MetricSchema>>;

// =============================================================================
// Organisms
// =============================================================================

export const GeneSchema = z.object({
  name: z.string(),
  definition: z.string(),
});

export type Gene = Readonly<z.infer<typeof GeneSchema>>;

export interface Organism {
  readonly name: string;
  readonly meta: Readonly<Record<string, string>>;
  readonly genes: readonly Gene[];
  /** Leading slice of the raw body */
  readonly excerpt: string;
}

// =============================================================================
// Sections
// =============================================================================

export interface Section {
  readonly title: string;
  readonly content: string;
  /** Ordinal of the title block among all detected title blocks */
  readonly position: number;
}

// =============================================================================
// Knowledge Records
// =============================================================================

export const KnowledgeRecordTypeSchema = z.enum(['instruction', 'equation', 'organism', 'knowledge']);

export type KnowledgeRecordType = z.infer<typeof KnowledgeRecordTypeSchema>;

export const KnowledgeRecordSchema = z.object({
  type: z.string().optional(),
  system: z.string().optional(),
  instruction: z.string().default(''),
  response: z.string().default(''),
  metadata: z.record(z.unknown()).default({}),
});

export type KnowledgeRecord = Readonly<z.infer<typeof KnowledgeRecordSchema>>;

// =============================================================================
// Extraction output
// =============================================================================

export interface ExtractionResult {
  equations: readonly Equation[];
  metrics: readonly Metric[];
  organisms: readonly Organism[];
  sections: readonly Section[];
}
