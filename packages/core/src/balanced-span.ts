/**
 * Balanced bracket scanning
 *
 * Finds the bracket that closes the one at `openIndex` by tracking depth,
 * so inner blocks never end the outer one early.
 */

export interface BalancedSpan {
  /** Index of the opening bracket */
  open: number;
  /** Index of the matching closing bracket */
  close: number;
  /** Text strictly between the two brackets */
  inner: string;
}

export function balancedSpan(
  text: string,
  openIndex: number,
  open: string = '{',
  close: string = '}'
): BalancedSpan | null {
  if (text[openIndex] !== open) return null;

  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return { open: openIndex, close: i, inner: text.slice(openIndex + 1, i) };
      }
    }
  }

  return null;
}

/**
 * Pairs every opening bracket with its closing one in a single pass.
 * Openings that never close are absent from the map.
 */
export function matchBrackets(text: string, open: string = '{', close: string = '}'): Map<number, number> {
  const pairs = new Map<number, number>();
  const stack: number[] = [];

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) {
      stack.push(i);
    } else if (ch === close) {
      const openIndex = stack.pop();
      if (openIndex !== undefined) pairs.set(openIndex, i);
    }
  }

  return pairs;
}

/**
 * Matches `header` (which must end on the opening bracket) and pairs each match
 * with its balanced span. Unbalanced headers are skipped and scanning resumes
 * right after them; balanced ones resume after the closing bracket.
 *
 * Brackets are paired once up front, so the scan stays linear however many
 * headers never close.
 */
export function* scanBlocks(
  text: string,
  header: RegExp,
  open: string = '{',
  close: string = '}'
): Generator<{ match: RegExpExecArray; span: BalancedSpan }> {
  const pattern = new RegExp(header.source, header.flags.includes('g') ? header.flags : `${header.flags}g`);
  const pairs = matchBrackets(text, open, close);
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const openIndex = match.index + match[0].length - 1;
    const closeIndex = text[openIndex] === open ? pairs.get(openIndex) : undefined;
    if (closeIndex === undefined) {
      pattern.lastIndex = openIndex + 1;
      continue;
    }
    pattern.lastIndex = closeIndex + 1;
    yield { match, span: { open: openIndex, close: closeIndex, inner: text.slice(openIndex + 1, closeIndex) } };
  }
}
