import * as path from 'path';
import dotenv from 'dotenv';
import { getGlobalEnvPath, logger } from '@pulseboard/core';

export interface EnvironmentSources {
    /** Directory whose `.env` forms the project layer */
    projectDir?: string;
    shellEnv?: NodeJS.ProcessEnv;
    globalEnvPath?: string;
}

function readEnvFile(filePath: string): Record<string, string> {
    // A missing file yields no `parsed`, not an exception
    return dotenv.config({ path: filePath, processEnv: {} }).parsed ?? {};
}

/**
 * Multi-layer environment variable loading.
 * Later layers win:
 * 1. Global ~/.pulseboard/.env
 * 2. Project .env
 * 3. Shell environment (empty values do not override)
 */
export function loadEnvironmentVariables(sources: EnvironmentSources = {}): Record<string, string> {
    const {
        projectDir = process.cwd(),
        shellEnv = process.env,
        globalEnvPath = getGlobalEnvPath(),
    } = sources;

    const env: Record<string, string> = {
        ...readEnvFile(globalEnvPath),
        ...readEnvFile(path.join(projectDir, '.env')),
    };

    for (const [key, value] of Object.entries(shellEnv)) {
        if (value !== undefined && value !== '') {
            env[key] = value;
        }
    }

    return env;
}

/**
 * Apply layered environment loading to process.env, then rebuild the shared logger so
 * logging settings from `.env` files take effect.
 * Called at CLI startup before any configuration is validated.
 */
export function applyLayeredEnvironmentLoading(projectDir: string = process.cwd()): void {
    Object.assign(process.env, loadEnvironmentVariables({ projectDir }));
    logger.reconfigure();
}
