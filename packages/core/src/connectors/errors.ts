import { PulseboardRuntimeError } from '../errors/PulseboardRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConnectorErrorCode } from './error-codes.js';

export type ConnectorService = 'monday' | 'harvest' | 'xero';

/**
 * Connector error factory. Every upstream failure is a THIRD_PARTY error
 * except timeouts, which keep their own type.
 */
export class ConnectorError {
    static requestFailed(service: ConnectorService, status: number, body: string) {
        return new PulseboardRuntimeError(
            ConnectorErrorCode.REQUEST_FAILED,
            ErrorScope.CONNECTOR,
            ErrorType.THIRD_PARTY,
            `${service} request failed with HTTP ${status}`,
            { service, status, body: body.slice(0, 500) },
            'Check the API token and account identifiers for this service'
        );
    }

    static timeout(service: ConnectorService, timeoutMs: number) {
        return new PulseboardRuntimeError(
            ConnectorErrorCode.REQUEST_TIMEOUT,
            ErrorScope.CONNECTOR,
            ErrorType.TIMEOUT,
            `${service} request timed out after ${timeoutMs}ms`,
            { service, timeoutMs },
            'Raise PULSEBOARD_HTTP_TIMEOUT_MS or retry later'
        );
    }

    static network(service: ConnectorService, cause: string) {
        return new PulseboardRuntimeError(
            ConnectorErrorCode.NETWORK_ERROR,
            ErrorScope.CONNECTOR,
            ErrorType.THIRD_PARTY,
            `${service} request could not be sent: ${cause}`,
            { service, cause }
        );
    }

    static invalidResponse(service: ConnectorService, detail: string) {
        return new PulseboardRuntimeError(
            ConnectorErrorCode.INVALID_RESPONSE,
            ErrorScope.CONNECTOR,
            ErrorType.THIRD_PARTY,
            `${service} returned an unexpected payload: ${detail}`,
            { service, detail }
        );
    }

    static boardNotFound(boardId: string) {
        return new PulseboardRuntimeError(
            ConnectorErrorCode.BOARD_NOT_FOUND,
            ErrorScope.CONNECTOR,
            ErrorType.THIRD_PARTY,
            `monday board ${boardId} was not returned`,
            { service: 'monday', boardId },
            'Set MONDAY_BOARD_ID to a board the token can read'
        );
    }
}
