/**
 * SECTIONS Stage
 *
 *   ════════════════
 *   SYSTEM OVERVIEW
 *   ════════════════
 *   ...content up to the next title block...
 *
 * Boundaries are found on the raw text; only the length check and the title
 * use normalized text.
 */

import type { Section } from '@strata/core';
import { normalizeText } from '@strata/core';

const TITLE_BLOCK = /[═─]{3,}\s*\n?\s*([A-Z][A-Z\s\-&:]+[A-Z])\s*\n?\s*[═─]{3,}/g;

export interface SectionOptions {
  maxLength: number;
  minLength: number;
}

const DEFAULT_OPTIONS: SectionOptions = { maxLength: 2000, minLength: 50 };

export function extractSections(text: string, options: Partial<SectionOptions> = {}): Section[] {
  const { maxLength, minLength } = { ...DEFAULT_OPTIONS, ...options };
  const titles = [...text.matchAll(TITLE_BLOCK)];
  const sections: Section[] = [];

  titles.forEach((match, i) => {
    const start = (match.index ?? 0) + match[0].length;
    const next = titles[i + 1];
    const end = next === undefined ? text.length : next.index ?? text.length;

    const content = text.slice(start, end).trim();
    if (normalizeText(content).length < minLength) return;

    sections.push({
      title: normalizeText(match[1]),
      content: content.slice(0, maxLength),
      position: i,
    });
  });

  return sections;
}
