import * as path from 'path';
import { homedir } from 'os';

/**
 * Per-user directory for the global `.env`, logs and anything else pulseboard keeps
 * outside a project. Overridable with PULSEBOARD_HOME, which tests use.
 */
export function getPulseboardHome(): string {
    return process.env.PULSEBOARD_HOME ?? path.join(homedir(), '.pulseboard');
}

/**
 * @param type Subdirectory such as `logs`; empty for the home directory itself
 * @param filename Optional file inside it
 */
export function getPulseboardPath(type: string, filename?: string): string {
    const base = type ? path.join(getPulseboardHome(), type) : getPulseboardHome();
    return filename ? path.join(base, filename) : base;
}

export function getGlobalEnvPath(): string {
    return getPulseboardPath('', '.env');
}
