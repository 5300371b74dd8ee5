import type { ConfigErrorCode } from '../config/error-codes.js';
import type { ConnectorErrorCode } from '../connectors/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Environment and settings validation
    CONNECTOR = 'connector', // monday.com, Harvest and Xero data loading
    REPORT = 'report', // Report aggregation
    TARGETS = 'targets', // Team targets file and updates
    BOOTSTRAP = 'bootstrap', // Runtime environment provisioning
    API = 'api', // HTTP layer
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist
    TIMEOUT = 'timeout', // 408 - operation timed out
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream provider failures, API errors
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/**
 * Error codes owned by this package. Downstream packages (reporting, cli)
 * declare their own enums and pass them as plain strings.
 */
export type PulseboardErrorCode = ConfigErrorCode | ConnectorErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: PulseboardErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
