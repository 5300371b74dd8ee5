import { ErrorScope, ErrorType, PulseboardRuntimeError } from '@pulseboard/core';
import { BootstrapErrorCode } from './error-codes.js';

/** Exit code used when a command cannot be started at all */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export interface BootstrapErrorContext {
    exitCode: number;
    step?: string;
    path?: string;
    command?: string;
}

/**
 * Aborts a bootstrap run. `exitCode` is what the CLI exits with: the failing command's own
 * status where there is one, 127 when it could not be spawned, 1 otherwise.
 */
export class BootstrapError extends PulseboardRuntimeError<BootstrapErrorContext> {
    readonly exitCode: number;

    constructor(
        code: BootstrapErrorCode,
        type: ErrorType,
        message: string,
        context: BootstrapErrorContext,
        recovery?: string
    ) {
        super(code, ErrorScope.BOOTSTRAP, type, message, context, recovery);
        this.name = 'BootstrapError';
        this.exitCode = context.exitCode;
    }

    static invalidOptions(message: string) {
        return new BootstrapError(BootstrapErrorCode.INVALID_OPTIONS, ErrorType.USER, message, {
            exitCode: 1,
        });
    }

    static manifestNotFound(path: string) {
        return new BootstrapError(
            BootstrapErrorCode.MANIFEST_NOT_FOUND,
            ErrorType.USER,
            `Dependency manifest not found: ${path}`,
            { exitCode: 1, path },
            'Create the manifest or pass --manifest'
        );
    }

    static manifestEmpty(path: string) {
        return new BootstrapError(
            BootstrapErrorCode.MANIFEST_EMPTY,
            ErrorType.USER,
            `Dependency manifest lists no packages: ${path}`,
            { exitCode: 1, path }
        );
    }

    static cacheNotFound(path: string) {
        return new BootstrapError(
            BootstrapErrorCode.CACHE_NOT_FOUND,
            ErrorType.USER,
            `Package cache directory not found: ${path}`,
            { exitCode: 1, path },
            'Fetch the package archives into the cache directory or pass --cache-dir'
        );
    }

    static envCreateFailed(path: string, cause: string) {
        return new BootstrapError(
            BootstrapErrorCode.ENV_CREATE_FAILED,
            ErrorType.SYSTEM,
            `Could not create environment at ${path}: ${cause}`,
            { exitCode: 1, path, step: 'EnvEnsured' }
        );
    }

    static commandFailed(step: string, command: string, exitCode: number) {
        return new BootstrapError(
            BootstrapErrorCode.COMMAND_FAILED,
            ErrorType.THIRD_PARTY,
            `${step} failed: \`${command}\` exited with code ${exitCode}`,
            { exitCode, step, command }
        );
    }

    static commandNotFound(step: string, command: string) {
        return new BootstrapError(
            BootstrapErrorCode.COMMAND_NOT_FOUND,
            ErrorType.SYSTEM,
            `${step} failed: \`${command}\` could not be started`,
            { exitCode: COMMAND_NOT_FOUND_EXIT_CODE, step, command },
            'Check that the toolchain is installed and on PATH'
        );
    }

    static verifyMarkerMissing(pkg: string) {
        return new BootstrapError(
            BootstrapErrorCode.VERIFY_MARKER_MISSING,
            ErrorType.SYSTEM,
            `Verification of ${pkg} did not print 'OK <version>'`,
            { exitCode: 1, step: 'Verified' }
        );
    }
}
