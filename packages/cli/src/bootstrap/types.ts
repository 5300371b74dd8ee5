import { z } from 'zod';

export const TOOLCHAINS = ['node', 'python'] as const;
export type ToolchainName = (typeof TOOLCHAINS)[number];

/**
 * States of a bootstrap run, in order. `Verified` is the only successful terminal state;
 * any step may abort instead of advancing.
 */
export const BOOTSTRAP_STATES = [
    'PolicySet',
    'EnvEnsured',
    'EnvActive',
    'InstallerUpgraded',
    'DependenciesInstalled',
    'Verified',
] as const;
export type BootstrapState = (typeof BOOTSTRAP_STATES)[number];

export const BootstrapOptionsSchema = z
    .object({
        toolchain: z.enum(TOOLCHAINS).default('node').describe('Runtime to provision'),
        root: z
            .string()
            .min(1)
            .optional()
            .describe('Project root that relative paths resolve against'),
        envDir: z.string().min(1).optional().describe('Isolated environment directory'),
        manifest: z.string().min(1).optional().describe('Dependency manifest file'),
        cacheDir: z
            .string()
            .min(1)
            .optional()
            .describe('Directory of pre-fetched package archives'),
        verify: z.string().min(1).optional().describe('Package imported to verify the environment'),
        python: z.string().min(1).optional().describe('Interpreter used to create a python venv'),
        skipInstallerUpgrade: z.boolean().default(false),
    })
    .strict();

export type BootstrapOptionsInput = z.input<typeof BootstrapOptionsSchema>;
export type BootstrapOptions = z.output<typeof BootstrapOptionsSchema>;

/** Every path absolute, every default filled in */
export interface BootstrapPlan {
    toolchain: ToolchainName;
    root: string;
    envDir: string;
    manifestPath: string;
    cacheDir: string;
    verifyPackage: string;
    python: string;
    skipInstallerUpgrade: boolean;
}

export interface CommandSpec {
    command: string;
    args: string[];
    cwd: string;
    env: NodeJS.ProcessEnv;
}

export interface CommandResult {
    exitCode: number;
    /** Combined stdout and stderr */
    output: string;
}

export interface BootstrapResult {
    state: 'Verified';
    version: string;
    createdEnv: boolean;
    transitions: BootstrapState[];
}
