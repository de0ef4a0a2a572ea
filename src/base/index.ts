/**
 * Base infrastructure
 *
 * Exports the element model and the error taxonomy shared by all stages
 */

export * from './ElementTypes.js';
export * from './errors.js';
