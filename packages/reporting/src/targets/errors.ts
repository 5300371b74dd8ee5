import {
    ErrorScope,
    ErrorType,
    PulseboardRuntimeError,
    PulseboardValidationError,
    zodToIssues,
} from '@pulseboard/core';
import type { ZodError } from 'zod';
import { TargetsErrorCode } from './error-codes.js';

export class TargetsError {
    static fileReadError(targetsPath: string, cause: string) {
        return new PulseboardRuntimeError(
            TargetsErrorCode.FILE_READ_ERROR,
            ErrorScope.TARGETS,
            ErrorType.SYSTEM,
            `Failed to read targets: ${cause}`,
            { targetsPath, cause },
            'Check that the targets file is valid YAML'
        );
    }

    static fileWriteError(targetsPath: string, cause: string) {
        return new PulseboardRuntimeError(
            TargetsErrorCode.FILE_WRITE_ERROR,
            ErrorScope.TARGETS,
            ErrorType.SYSTEM,
            `Failed to save targets: ${cause}`,
            { targetsPath, cause },
            'Check file permissions and available disk space'
        );
    }

    static validationFailed(zodError: ZodError) {
        return new PulseboardValidationError(
            zodToIssues(zodError, ErrorScope.TARGETS, TargetsErrorCode.VALIDATION_ERROR)
        );
    }

    static invalidTeam(team: string) {
        return new PulseboardValidationError([
            {
                code: TargetsErrorCode.INVALID_TEAM,
                message: `Team name is invalid: '${team}'`,
                scope: ErrorScope.TARGETS,
                type: ErrorType.USER,
                severity: 'error' as const,
            },
        ]);
    }
}
