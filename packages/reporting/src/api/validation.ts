import type { ZodError } from 'zod';

type ValidationResult = { success: true } | { success: false; error: ZodError };

/**
 * Route validation hook that rethrows the ZodError, so request validation failures reach
 * `handleHonoError` and share the error body every other failure uses.
 */
export function throwOnInvalid(result: ValidationResult): void {
    if (!result.success) {
        throw result.error;
    }
}
