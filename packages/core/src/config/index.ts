export { ConnectorConfigSchema } from './schemas.js';
export type { ConnectorConfig, ConnectorConfigInput } from './schemas.js';
export { loadConnectorConfig, hasLiveCredentials, CONNECTOR_ENV_VARS } from './loader.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
