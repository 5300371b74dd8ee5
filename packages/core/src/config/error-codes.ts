/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    INVALID_ENVIRONMENT = 'config_invalid_environment',
}
