export enum ReportErrorCode {
    UNKNOWN_TABLE = 'report_unknown_table',
    DATASET_LOAD_FAILED = 'report_dataset_load_failed',
}
