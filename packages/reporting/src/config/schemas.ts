import { z } from 'zod';
import { DEFAULT_TARGETS_FILE } from '../targets/store.js';

/**
 * Dashboard server settings, read from PULSEBOARD_PORT and PULSEBOARD_TARGETS_FILE.
 */
export const ServerConfigSchema = z
    .object({
        port: z.coerce.number().int().min(1).max(65535).default(3002).describe('HTTP port'),
        hostname: z.string().default('0.0.0.0').describe('Interface to bind'),
        targetsFile: z
            .string()
            .min(1)
            .default(`./${DEFAULT_TARGETS_FILE}`)
            .describe('YAML file holding per-team targets'),
    })
    .strict();

export type ServerConfig = z.output<typeof ServerConfigSchema>;
