import type { ZodError } from 'zod';
import { ErrorType, type Issue } from './types.js';

/**
 * Convert a ZodError into Pulseboard issues so every validation failure
 * reaches callers in the same shape.
 */
export function zodToIssues(
    error: ZodError,
    scope: string = 'api',
    code: string = 'invalid_input'
): Issue[] {
    return error.issues.map((issue) => ({
        code,
        message:
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        scope,
        type: ErrorType.USER,
        severity: 'error' as const,
        path: issue.path,
    }));
}
