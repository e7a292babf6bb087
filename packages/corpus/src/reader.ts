import { readFileSync } from 'node:fs';
import { CorpusReadError, decodePermissive } from '@strata/core';

/**
 * Reads a corpus file as UTF-8, dropping invalid byte sequences.
 * Any I/O failure surfaces as CorpusReadError.
 */
export function readCorpusFile(path: string): string {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    throw new CorpusReadError(path, error);
  }
  return decodePermissive(bytes);
}
