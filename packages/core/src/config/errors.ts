import type { ZodError } from 'zod';
import { PulseboardValidationError } from '../errors/PulseboardValidationError.js';
import { ErrorScope } from '../errors/types.js';
import { zodToIssues } from '../errors/zod.js';
import { ConfigErrorCode } from './error-codes.js';

export class ConfigError {
    static invalidEnvironment(zodError: ZodError) {
        return new PulseboardValidationError(
            zodToIssues(zodError, ErrorScope.CONFIG, ConfigErrorCode.INVALID_ENVIRONMENT)
        );
    }
}
