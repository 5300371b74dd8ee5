export type {
    Deal,
    TimeEntry,
    Invoice,
    InvoiceStatus,
    Dataset,
    DataSource,
} from './types.js';
export { UNKNOWN } from './types.js';
export { parseDate, toNumber, roundTo, addDays, toIsoDate, monthKey, yearOf } from './coerce.js';
