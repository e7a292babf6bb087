/**
 * @strata/extract - Structured record extraction from raw text
 *
 * 4 stages: EQUATIONS, METRICS, ORGANISMS, SECTIONS
 */

export * from './stages/equations';
export * from './stages/metrics';
export * from './stages/organisms';
export * from './stages/sections';
export * from './symbols';
export * from './extractor';
