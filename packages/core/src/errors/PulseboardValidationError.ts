import { PulseboardBaseError } from './PulseboardBaseError.js';
import type { Issue } from './types.js';

/**
 * Raised when input fails validation. Holds every issue found, errors and warnings alike.
 */
export class PulseboardValidationError extends PulseboardBaseError {
    public readonly issues: Issue[];

    constructor(issues: Issue[], traceId?: string) {
        const first = issues.find((i) => i.severity === 'error') ?? issues[0];
        super(first ? first.message : 'Validation failed', traceId);
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        const first = this.errors[0] ?? this.issues[0];
        return {
            code: first?.code ?? 'validation_failed',
            message: this.message,
            scope: first?.scope ?? 'api',
            type: first?.type ?? 'user',
            severity: 'error',
            issues: this.issues,
            traceId: this.traceId,
        };
    }
}
