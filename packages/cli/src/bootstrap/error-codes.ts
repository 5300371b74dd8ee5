export enum BootstrapErrorCode {
    INVALID_OPTIONS = 'bootstrap_invalid_options',
    MANIFEST_NOT_FOUND = 'bootstrap_manifest_not_found',
    MANIFEST_EMPTY = 'bootstrap_manifest_empty',
    CACHE_NOT_FOUND = 'bootstrap_cache_not_found',
    ENV_CREATE_FAILED = 'bootstrap_env_create_failed',
    COMMAND_FAILED = 'bootstrap_command_failed',
    COMMAND_NOT_FOUND = 'bootstrap_command_not_found',
    VERIFY_MARKER_MISSING = 'bootstrap_verify_marker_missing',
}
