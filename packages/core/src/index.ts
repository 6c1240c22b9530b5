/**
 * @mergington/core
 *
 * Activity records, the in-memory activity directory, and the structured
 * errors shared by the HTTP server and the process entry.
 */

// Types - activity records and seed validation
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';

// Directory - roster operations over the in-memory activity set
export * from './directory/index.js';
