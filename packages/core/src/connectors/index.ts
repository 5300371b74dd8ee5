export { DataConnector } from './data-connector.js';
export type { DataConnectorOptions } from './data-connector.js';
export { MondayClient, mapMondayItem, buildDealsQuery, MONDAY_API_URL } from './monday.js';
export type { MondayClientOptions } from './monday.js';
export { HarvestClient, mapHarvestEntry, HARVEST_API_URL } from './harvest.js';
export type { HarvestClientOptions } from './harvest.js';
export { XeroClient, mapXeroInvoice, XERO_INVOICES_URL } from './xero.js';
export type { XeroClientOptions } from './xero.js';
export { generateDemoData, DEMO_TEAMS, DEMO_CLIENTS, DEMO_SEED } from './demo.js';
export type { DemoOptions, DemoData } from './demo.js';
export { createSeededRandom } from './random.js';
export type { RandomSource } from './random.js';
export { requestJson, isConnectorError } from './http.js';
export type { FetchFn, RequestOptions } from './http.js';
export { ConnectorError } from './errors.js';
export type { ConnectorService } from './errors.js';
export { ConnectorErrorCode } from './error-codes.js';
