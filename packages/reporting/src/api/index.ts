/**
 * HTTP API over the reports
 */

export { createReportingRouter, createHealthRouter } from './routes.js';
export { ReportService, RAW_TABLES, isRawTable } from './report-service.js';
export type { DatasetLoader, DatasetStatus, RawTable, BillingPeriod } from './report-service.js';
export { ReportError } from './errors.js';
export { ReportErrorCode } from './error-codes.js';
export * as schemas from './schemas.js';
