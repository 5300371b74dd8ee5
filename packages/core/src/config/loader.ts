import { logger } from '../logger/index.js';
import { ConfigError } from './errors.js';
import { ConnectorConfigSchema, type ConnectorConfig } from './schemas.js';

/**
 * Environment variables read by the connector. Kept in one place so the CLI
 * can list them in its help output.
 */
export const CONNECTOR_ENV_VARS = {
    mondayToken: 'MONDAY_API_TOKEN',
    mondayBoardId: 'MONDAY_BOARD_ID',
    harvestToken: 'HARVEST_API_TOKEN',
    harvestAccountId: 'HARVEST_ACCOUNT_ID',
    xeroToken: 'XERO_ACCESS_TOKEN',
    xeroTenantId: 'XERO_TENANT_ID',
    timeoutMs: 'PULSEBOARD_HTTP_TIMEOUT_MS',
} as const;

/**
 * Build and validate connector config from environment variables.
 * @throws PulseboardValidationError if a value is malformed
 */
export function loadConnectorConfig(
    env: Record<string, string | undefined> = process.env
): ConnectorConfig {
    const raw: Record<string, string | undefined> = {};
    for (const [key, envVar] of Object.entries(CONNECTOR_ENV_VARS)) {
        const value = env[envVar];
        if (value !== undefined && value !== '') {
            raw[key] = value;
        }
    }

    const result = ConnectorConfigSchema.safeParse(raw);
    if (!result.success) {
        throw ConfigError.invalidEnvironment(result.error);
    }

    const config = result.data;
    logger.debug(
        `Connector config loaded (monday: ${Boolean(config.mondayToken)}, harvest: ${Boolean(
            config.harvestToken
        )}, xero: ${Boolean(config.xeroToken)})`
    );
    return config;
}

/**
 * Live data needs all three tokens; anything less falls back to demo data.
 */
export function hasLiveCredentials(config: ConnectorConfig): boolean {
    return Boolean(config.mondayToken && config.harvestToken && config.xeroToken);
}
