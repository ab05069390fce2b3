/**
 * Variant identity normalization: HGVS parsing, amino-acid tables, coordinates
 */

export * from './amino-acids.js';
export * from './hgvs.js';
export * from './coordinates.js';
export * from './fields.js';
