/**
 * ORGANISMS Stage
 *
 *   ORGANISM <name> {
 *     META { key: "value" ... }
 *     GENE <name> { <definition> }
 *     ...
 *   }
 *
 * Block ends are found with balanced-bracket scanning, so a definition that
 * contains its own braces never cuts the organism short.
 */

import type { Gene, Organism } from '@strata/core';
import { balancedSpan, normalizeText, scanBlocks } from '@strata/core';

const ORGANISM_HEADER = /ORGANISM\s+(\w+)\s*\{/g;
const META_HEADER = /META\s*\{/;
const GENE_HEADER = /GENE\s+(\w+)\s*\{/g;

export interface OrganismOptions {
  excerptLength: number;
}

const DEFAULT_OPTIONS: OrganismOptions = { excerptLength: 500 };

export function extractOrganisms(text: string, options: Partial<OrganismOptions> = {}): Organism[] {
  const { excerptLength } = { ...DEFAULT_OPTIONS, ...options };
  const organisms: Organism[] = [];

  for (const { match, span } of scanBlocks(text, ORGANISM_HEADER)) {
    const body = span.inner;
    organisms.push({
      name: match[1],
      meta: parseMeta(body),
      genes: parseGenes(body),
      excerpt: body.slice(0, excerptLength),
    });
  }

  return organisms;
}

/**
 * Reads the first META block as `key: value` lines.
 */
export function parseMeta(body: string): Record<string, string> {
  const header = META_HEADER.exec(body);
  if (!header) return {};

  const span = balancedSpan(body, header.index + header[0].length - 1);
  if (!span) return {};

  // Collected as pairs so keys like __proto__ become ordinary entries
  const entries: Array<[string, string]> = [];
  for (const line of span.inner.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const key = normalizeText(line.slice(0, colon));
    const value = stripQuotes(normalizeText(line.slice(colon + 1)));
    entries.push([key, value]);
  }

  return Object.fromEntries(entries);
}

export function parseGenes(body: string): Gene[] {
  const genes: Gene[] = [];
  for (const { match, span } of scanBlocks(body, GENE_HEADER)) {
    genes.push({ name: match[1], definition: normalizeText(span.inner) });
  }
  return genes;
}

function stripQuotes(value: string): string {
  return value.replace(/^["']+|["']+$/g, '');
}
