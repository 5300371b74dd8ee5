/**
 * Connector error codes, shared by the monday.com, Harvest and Xero clients
 */
export enum ConnectorErrorCode {
    REQUEST_FAILED = 'connector_request_failed',
    REQUEST_TIMEOUT = 'connector_request_timeout',
    NETWORK_ERROR = 'connector_network_error',
    INVALID_RESPONSE = 'connector_invalid_response',
    BOARD_NOT_FOUND = 'connector_board_not_found',
}
