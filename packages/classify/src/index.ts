export * from './review-stars.js';
export * from './lof.js';
