/**
 * @docuqueue/shared-infrastructure
 *
 * Env parsing and durable file helpers used across docuqueue packages.
 */

export * from './env/loaders.js';

export * from './fs/atomic-json.js';
