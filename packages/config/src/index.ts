/**
 * Shared configuration: env loading, settings, gene reference, logging
 */

export * from './env.js';
export * from './settings.js';
export * from './genes.js';
export * from './logger.js';
