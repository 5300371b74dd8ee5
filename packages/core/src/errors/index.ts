/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { PulseboardBaseError } from './PulseboardBaseError.js';
export { PulseboardRuntimeError } from './PulseboardRuntimeError.js';
export { PulseboardValidationError } from './PulseboardValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity, PulseboardErrorCode } from './types.js';
export { zodToIssues } from './zod.js';
