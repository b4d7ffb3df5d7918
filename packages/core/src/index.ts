/**
 * @rdg-mapper/core
 *
 * Shared data model, collaborator interfaces and utilities for the RDG mapper
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export * from './logging/index.js';
