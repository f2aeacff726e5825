/**
 * nexus-reconcile library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the engine, the schema
 * catalogue, the API collaborator and the desired-state loader.
 */

export * from './engine/index.js';
export * from './schemas/index.js';
export * from './api/index.js';
export * from './config/index.js';
