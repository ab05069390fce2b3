/**
 * Build orchestration: pipeline, verification and report rendering
 */

export * from './pipeline.js';
export * from './verify.js';
export * from './format.js';
