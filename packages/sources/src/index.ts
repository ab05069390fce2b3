/**
 * Source adapters: ClinVar, AlphaMissense, REVEL, gnomAD and CADD
 */

export * from './types.js';
export * from './errors.js';
export * from './http.js';
export * from './lines.js';
export * from './truncation.js';
export * from './clinvar.js';
export * from './alphamissense.js';
export * from './revel.js';
export * from './gnomad.js';
export * from './cadd.js';
export * from './registry.js';
