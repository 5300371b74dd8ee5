export enum TargetsErrorCode {
    FILE_READ_ERROR = 'targets_file_read_error',
    FILE_WRITE_ERROR = 'targets_file_write_error',
    VALIDATION_ERROR = 'targets_validation_error',
    INVALID_TEAM = 'targets_invalid_team',
}
