import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { zodToIssues } from './zod.js';
import { PulseboardRuntimeError } from './PulseboardRuntimeError.js';
import { PulseboardValidationError } from './PulseboardValidationError.js';
import { ErrorScope, ErrorType } from './types.js';

describe('zodToIssues', () => {
    const schema = z.object({ port: z.number().int(), teams: z.array(z.string()) }).strict();

    it('prefixes messages with the failing path', () => {
        const result = schema.safeParse({ port: 1.5, teams: ['Growth', 3] });
        if (result.success) throw new Error('expected failure');

        const issues = zodToIssues(result.error, 'config', 'config_invalid');

        expect(issues.map((issue) => issue.message)).toEqual([
            'port: Expected integer, received float',
            'teams.1: Expected string, received number',
        ]);
        expect(issues[0]).toMatchObject({
            code: 'config_invalid',
            scope: 'config',
            type: ErrorType.USER,
            severity: 'error',
            path: ['port'],
        });
    });

    it('defaults to the api scope', () => {
        const result = z.string().safeParse(1);
        if (result.success) throw new Error('expected failure');

        const [issue] = zodToIssues(result.error);

        expect(issue?.scope).toBe('api');
        expect(issue?.code).toBe('invalid_input');
        expect(issue?.message).toBe('Expected string, received number');
    });
});

describe('PulseboardValidationError', () => {
    it('takes its message from the first error issue', () => {
        const error = new PulseboardValidationError([
            {
                code: 'w',
                message: 'just a warning',
                scope: 'api',
                type: ErrorType.USER,
                severity: 'warning',
            },
            {
                code: 'e',
                message: 'port: required',
                scope: 'config',
                type: ErrorType.USER,
                severity: 'error',
            },
        ]);

        expect(error.message).toBe('port: required');
        expect(error.errors).toHaveLength(1);
        expect(error.warnings).toHaveLength(1);
        expect(error.toJSON()).toMatchObject({ code: 'e', scope: 'config', type: 'user' });
    });

    it('falls back to a generic message without issues', () => {
        expect(new PulseboardValidationError([]).message).toBe('Validation failed');
    });
});

describe('PulseboardRuntimeError', () => {
    it('serializes optional fields only when present', () => {
        const error = new PulseboardRuntimeError(
            'report_unknown_table',
            ErrorScope.REPORT,
            ErrorType.NOT_FOUND,
            'Unknown table',
            undefined,
            undefined,
            'trace-1'
        );

        expect(error.name).toBe('PulseboardRuntimeError');
        expect(error.toJSON()).toEqual({
            code: 'report_unknown_table',
            message: 'Unknown table',
            scope: 'report',
            type: 'not_found',
            severity: 'error',
            traceId: 'trace-1',
        });
    });
});
