/**
 * @strata/core - Shared primitives for corpus extraction and retrieval
 *
 * - Records: zod schemas and inferred types
 * - Config: immutable configuration value
 * - Text: normalization, permissive decoding, balanced spans, tokenizing
 */

export * from './types';
export * from './config';
export * from './errors';
export * from './logger';
export * from './text';
export * from './balanced-span';
export * from './tokenizer';
export * from './sequence';
export * from './template';
