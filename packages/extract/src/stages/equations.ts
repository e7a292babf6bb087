/**
 * EQUATIONS Stage
 *
 * Numbered equations: "(12) E=mc^2" -> EQ_12
 * Symbolic equations: a fixed, ordered list of left-hand sides, each matched
 * independently over the whole corpus.
 */

import type { Equation, SymbolicEquationType } from '@strata/core';
import { IdSequence, normalizeText } from '@strata/core';

const NUMBERED_EQUATION = /\((\d+)\)\s+([^\n]+)/g;

export const SYMBOLIC_PATTERNS: ReadonlyArray<readonly [RegExp, SymbolicEquationType]> = [
  [/Ω\[S\]\s*=\s*([^\n]+)/g, 'session_functional'],
  [/Ξ_S\s*=\s*([^\n]+)/g, 'ccce_metric'],
  [/T_μν\s*=\s*([^\n]+)/g, 'tensor_definition'],
  [/R_αβ\s*=\s*([^\n]+)/g, 'resource_matrix'],
  [/L\(s\)\s*=\s*([^\n]+)/g, 'effort_functional'],
  [/C_μ\s*=\s*([^\n]+)/g, 'capability_tensor'],
  [/Ω_R\s*=\s*([^\n]+)/g, 'readiness_score'],
];

export function extractNumberedEquations(text: string): Equation[] {
  const equations: Equation[] = [];
  for (const match of text.matchAll(NUMBERED_EQUATION)) {
    equations.push({
      id: `EQ_${match[1]}`,
      formula: normalizeText(match[2]),
      type: 'numbered',
    });
  }
  return equations;
}

/**
 * Ids are `<type>_<n>` with n counted per type by `ids`, so an id never
 * depends on how many equations of other types came before it.
 */
export function extractSymbolicEquations(text: string, ids: IdSequence = new IdSequence()): Equation[] {
  const equations: Equation[] = [];
  for (const [pattern, type] of SYMBOLIC_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      equations.push({
        id: ids.nextId(type),
        formula: normalizeText(match[1]),
        type,
      });
    }
  }
  return equations;
}

export function extractEquations(text: string, ids: IdSequence = new IdSequence()): Equation[] {
  return [...extractNumberedEquations(text), ...extractSymbolicEquations(text, ids)];
}
