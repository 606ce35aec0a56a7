// @module: shared-schemas-root
// @tags: schemas, exports
export * from './ws/envelope.js';
export * from './ws/move.js';
export * from './rest/status.js';
