/**
 * Models module exports
 */

// Type definitions
export * from '../types/models';

// Validation functions and schemas
export * from './validation';

// Error taxonomy
export * from './errors';
