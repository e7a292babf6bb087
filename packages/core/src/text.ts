/**
 * Text primitives shared by extraction and indexing
 */

// ESC + single Fe byte, or a full CSI sequence
const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

/**
 * Strips ANSI escapes, collapses whitespace runs to one space and trims.
 */
export function normalizeText(text: string): string {
  return stripAnsi(text).replace(/\s+/g, ' ').trim();
}

/**
 * Decodes UTF-8 bytes, dropping invalid sequences instead of failing.
 *
 * The decoder turns each invalid sequence into U+FFFD, so the input is split on
 * the encoded form of U+FFFD (EF BF BD) first: characters that were really
 * present survive, and only those the decoder inserted are removed.
 */
export function decodePermissive(bytes: Uint8Array): string {
  const parts: string[] = [];
  let start = 0;

  for (let i = 0; i + 2 < bytes.length; i++) {
    if (bytes[i] === 0xef && bytes[i + 1] === 0xbf && bytes[i + 2] === 0xbd) {
      parts.push(decodeSegment(bytes.subarray(start, i), start === 0));
      start = i + 3;
      i += 2;
    }
  }
  parts.push(decodeSegment(bytes.subarray(start), start === 0));

  return parts.join('\uFFFD');
}

// A leading byte-order mark is dropped only at the start of the input
function decodeSegment(bytes: Uint8Array, atStart: boolean): string {
  return new TextDecoder('utf-8', { fatal: false, ignoreBOM: !atStart }).decode(bytes).replace(/\uFFFD/g, '');
}

export function countOccurrences(text: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = text.indexOf(needle);
  while (from !== -1) {
    count++;
    from = text.indexOf(needle, from + needle.length);
  }
  return count;
}
