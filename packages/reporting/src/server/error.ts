import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
    ErrorType,
    PulseboardRuntimeError,
    PulseboardValidationError,
    logger,
    zodToIssues,
    type Issue,
} from '@pulseboard/core';

type ErrorStatus = 400 | 404 | 408 | 500 | 502;

export const mapErrorTypeToStatus = (type: ErrorType): ErrorStatus => {
    switch (type) {
        case ErrorType.USER:
            return 400;
        case ErrorType.NOT_FOUND:
            return 404;
        case ErrorType.TIMEOUT:
            return 408;
        case ErrorType.SYSTEM:
            return 500;
        case ErrorType.THIRD_PARTY:
            return 502;
        case ErrorType.UNKNOWN:
        default:
            return 500;
    }
};

export const statusForValidation = (issues: Issue[]): ErrorStatus => {
    const firstError = issues.find((i) => i.severity === 'error');
    return mapErrorTypeToStatus(firstError?.type ?? ErrorType.USER);
};

export function handleHonoError(ctx: Context, err: unknown) {
    if (err instanceof PulseboardRuntimeError) {
        return ctx.json(err.toJSON(), mapErrorTypeToStatus(err.type));
    }

    if (err instanceof PulseboardValidationError) {
        return ctx.json(err.toJSON(), statusForValidation(err.issues));
    }

    if (err instanceof ZodError) {
        const issues = zodToIssues(err);
        const validationError = new PulseboardValidationError(issues);
        return ctx.json(validationError.toJSON(), statusForValidation(issues));
    }

    // Raised by hono itself, e.g. for a malformed JSON body
    if (err instanceof HTTPException) {
        return err.getResponse();
    }

    // ctx.req.json() throws SyntaxError for an invalid or empty body
    if (err instanceof SyntaxError) {
        return ctx.json(
            {
                code: 'invalid_json',
                message: err.message || 'Invalid JSON body',
                scope: 'api',
                type: 'user',
                severity: 'error',
            },
            400
        );
    }

    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Unhandled error in API: ${errorMessage}`, {
        stack: err instanceof Error ? err.stack : undefined,
    });

    const isDevelopment = process.env.NODE_ENV === 'development';
    return ctx.json(
        {
            code: 'internal_error',
            message: isDevelopment
                ? `An unexpected error occurred: ${errorMessage}`
                : 'An unexpected error occurred. Please try again later.',
            scope: 'api',
            type: 'system',
            severity: 'error',
        },
        500
    );
}
