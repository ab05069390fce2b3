// Note: .env loading is handled centrally by @allelebase/config.
// Open the store after initEnv()/loadSettings() have run.

export * from './schema.js';
export * from './patch.js';
export * from './errors.js';
export * from './clock.js';
export { migrate, SCHEMA_VERSION } from './migrations.js';
export * from './repositories.js';
export * from './merge.js';
export * from './store.js';
