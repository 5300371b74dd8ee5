import { PulseboardBaseError } from './PulseboardBaseError.js';
import { ErrorScope, ErrorType } from './types.js';
import type { PulseboardErrorCode } from './types.js';

/**
 * Runtime error with a stable code, the scope that raised it and an error type
 * that the HTTP layer maps to a status code.
 */
export class PulseboardRuntimeError<C = Record<string, unknown>> extends PulseboardBaseError {
    constructor(
        public readonly code: PulseboardErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[],
        traceId?: string
    ) {
        super(message, traceId);
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            severity: 'error',
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
            traceId: this.traceId,
        };
    }
}
