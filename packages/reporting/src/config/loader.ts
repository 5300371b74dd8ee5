import { ConfigError } from '@pulseboard/core';
import { ServerConfigSchema, type ServerConfig } from './schemas.js';

export interface ServerConfigOverrides {
    port?: number | string;
    hostname?: string;
    targetsFile?: string;
}

/**
 * Explicit options win over environment variables, which win over defaults.
 * @throws PulseboardValidationError for an invalid port or empty targets path
 */
export function loadServerConfig(
    overrides: ServerConfigOverrides = {},
    env: Record<string, string | undefined> = process.env
): ServerConfig {
    const raw: Record<string, unknown> = {};
    const port = overrides.port ?? env.PULSEBOARD_PORT;
    const targetsFile = overrides.targetsFile ?? env.PULSEBOARD_TARGETS_FILE;
    if (port !== undefined && port !== '') raw.port = port;
    if (targetsFile !== undefined && targetsFile !== '') raw.targetsFile = targetsFile;
    if (overrides.hostname !== undefined) raw.hostname = overrides.hostname;

    const result = ServerConfigSchema.safeParse(raw);
    if (!result.success) {
        throw ConfigError.invalidEnvironment(result.error);
    }
    return result.data;
}
