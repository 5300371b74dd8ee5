import { ErrorScope, ErrorType, PulseboardRuntimeError } from '@pulseboard/core';
import { ReportErrorCode } from './error-codes.js';

export class ReportError {
    static unknownTable(table: string, known: readonly string[]) {
        return new PulseboardRuntimeError(
            ReportErrorCode.UNKNOWN_TABLE,
            ErrorScope.REPORT,
            ErrorType.NOT_FOUND,
            `Unknown table '${table}'`,
            { table, known },
            `Use one of: ${known.join(', ')}`
        );
    }

    static datasetLoadFailed(cause: string) {
        return new PulseboardRuntimeError(
            ReportErrorCode.DATASET_LOAD_FAILED,
            ErrorScope.REPORT,
            ErrorType.SYSTEM,
            `Failed to load dataset: ${cause}`,
            { cause }
        );
    }
}
