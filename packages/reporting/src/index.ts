/**
 * @pulseboard/reporting
 *
 * Report builders, team targets, the reporting HTTP API and the dashboard server.
 *
 * @packageDocumentation
 */

export * from './reports/index.js';
export * from './targets/index.js';
export * from './api/index.js';
export { createPulseboardApp, DEFAULT_WEB_ROOT } from './server/app.js';
export type { PulseboardApp, CreatePulseboardAppOptions } from './server/app.js';
export { handleHonoError, mapErrorTypeToStatus } from './server/error.js';
export { startDashboardServer } from './server/dashboard-server.js';
export type { DashboardServer, DashboardServerOptions } from './server/dashboard-server.js';
export { loadServerConfig } from './config/loader.js';
export type { ServerConfigOverrides } from './config/loader.js';
export { ServerConfigSchema } from './config/schemas.js';
export type { ServerConfig } from './config/schemas.js';
