import path from 'path';
import fs from 'fs-extra';
import { logger, zodToIssues } from '@pulseboard/core';
import { formatCommand, type CommandRunner } from './command-runner.js';
import { BootstrapError, COMMAND_NOT_FOUND_EXIT_CODE } from './errors.js';
import { readManifest } from './manifest.js';
import { getToolchain, type Toolchain } from './toolchains.js';
import {
    BootstrapOptionsSchema,
    type BootstrapOptionsInput,
    type BootstrapPlan,
    type BootstrapResult,
    type BootstrapState,
    type CommandSpec,
} from './types.js';

const VERIFY_MARKER = /^OK (\S+)\s*$/m;

export function defaultPython(platform: NodeJS.Platform = process.platform): string {
    return platform === 'win32' ? 'python' : 'python3';
}

/**
 * Validates options and resolves every path against the project root.
 * @throws BootstrapError on invalid options
 */
export function resolveBootstrapPlan(
    input: BootstrapOptionsInput | Record<string, unknown>,
    cwd: string = process.cwd(),
    platform: NodeJS.Platform = process.platform
): BootstrapPlan {
    const parsed = BootstrapOptionsSchema.safeParse(input);
    if (!parsed.success) {
        const first = zodToIssues(parsed.error, 'bootstrap')[0];
        throw BootstrapError.invalidOptions(first?.message ?? 'Invalid bootstrap options');
    }
    const options = parsed.data;
    const { defaults } = getToolchain(options.toolchain, platform);
    const root = path.resolve(cwd, options.root ?? '.');

    return {
        toolchain: options.toolchain,
        root,
        envDir: path.resolve(root, options.envDir ?? defaults.envDir),
        manifestPath: path.resolve(root, options.manifest ?? defaults.manifest),
        cacheDir: path.resolve(root, options.cacheDir ?? defaults.cacheDir),
        verifyPackage: options.verify ?? defaults.verifyPackage,
        python: options.python ?? defaultPython(platform),
        skipInstallerUpgrade: options.skipInstallerUpgrade,
    };
}

export interface BootstrapperOptions {
    runner: CommandRunner;
    platform?: NodeJS.Platform;
    /** Environment handed to child processes before any step changes it */
    baseEnv?: NodeJS.ProcessEnv;
    onTransition?: (state: BootstrapState, detail: string) => void;
}

/**
 * Prepares an isolated runtime environment and proves the dashboard framework loads in it.
 *
 * PolicySet -> EnvEnsured -> EnvActive -> InstallerUpgraded -> DependenciesInstalled -> Verified
 *
 * Each step either advances the state or throws a BootstrapError; nothing is retried.
 */
export class Bootstrapper {
    private readonly toolchain: Toolchain;
    private readonly runner: CommandRunner;
    private readonly platform: NodeJS.Platform;
    private readonly onTransition: (state: BootstrapState, detail: string) => void;
    private env: NodeJS.ProcessEnv;
    private readonly transitions: BootstrapState[] = [];

    constructor(
        private readonly plan: BootstrapPlan,
        options: BootstrapperOptions
    ) {
        this.platform = options.platform ?? process.platform;
        this.toolchain = getToolchain(plan.toolchain, this.platform);
        this.runner = options.runner;
        this.env = { ...(options.baseEnv ?? process.env) };
        this.onTransition = options.onTransition ?? (() => undefined);
    }

    get state(): BootstrapState | null {
        return this.transitions[this.transitions.length - 1] ?? null;
    }

    async run(): Promise<BootstrapResult> {
        const packages = await this.preflight();

        this.setPolicy();
        const createdEnv = await this.ensureEnv();
        this.activate();
        await this.upgradeInstaller();
        await this.install(packages);
        const version = await this.verify();

        return { state: 'Verified', version, createdEnv, transitions: [...this.transitions] };
    }

    /**
     * Manifest and cache problems are reported before anything is created or installed.
     */
    private async preflight(): Promise<string[]> {
        const packages = await readManifest(this.plan.manifestPath);
        if (!(await fs.pathExists(this.plan.cacheDir))) {
            throw BootstrapError.cacheNotFound(this.plan.cacheDir);
        }
        return packages;
    }

    private setPolicy(): void {
        if (this.platform === 'win32') {
            // Read by every PowerShell the children start; never written anywhere persistent
            this.env = { ...this.env, PSExecutionPolicyPreference: 'Bypass' };
            this.advance('PolicySet', 'execution policy set to Bypass for this process');
        } else {
            this.advance('PolicySet', 'no execution policy on this platform');
        }
    }

    private async ensureEnv(): Promise<boolean> {
        const { envDir } = this.plan;
        if (await fs.pathExists(envDir)) {
            this.advance('EnvEnsured', `reusing ${envDir}`);
            return false;
        }

        const create = this.toolchain.createEnv(this.plan, this.env);
        if (create) {
            await this.exec('EnvEnsured', create);
        } else {
            try {
                await fs.ensureDir(envDir);
            } catch (error) {
                throw BootstrapError.envCreateFailed(
                    envDir,
                    error instanceof Error ? error.message : String(error)
                );
            }
        }
        this.advance('EnvEnsured', `created ${envDir}`);
        return true;
    }

    private activate(): void {
        this.env = this.toolchain.activate(this.plan, this.env);
        this.advance('EnvActive', `activated ${this.plan.envDir}`);
    }

    private async upgradeInstaller(): Promise<void> {
        if (this.plan.skipInstallerUpgrade) {
            this.advance('InstallerUpgraded', 'skipped');
            return;
        }
        await this.exec('InstallerUpgraded', this.toolchain.upgradeInstaller(this.plan, this.env));
        this.advance('InstallerUpgraded', 'installer upgraded');
    }

    private async install(packages: string[]): Promise<void> {
        await this.exec(
            'DependenciesInstalled',
            this.toolchain.install(this.plan, packages, this.env)
        );
        this.advance('DependenciesInstalled', `${packages.length} package(s) from the local cache`);
    }

    private async verify(): Promise<string> {
        const output = await this.exec('Verified', this.toolchain.verify(this.plan, this.env));
        const version = VERIFY_MARKER.exec(output)?.[1];
        if (!version) {
            throw BootstrapError.verifyMarkerMissing(this.plan.verifyPackage);
        }
        this.advance('Verified', `${this.plan.verifyPackage} ${version}`);
        return version;
    }

    private async exec(step: BootstrapState, spec: CommandSpec): Promise<string> {
        const display = formatCommand(spec);
        logger.debug(`[${step}] ${display}`);
        const result = await this.runner.run(spec);
        if (result.exitCode === COMMAND_NOT_FOUND_EXIT_CODE) {
            throw BootstrapError.commandNotFound(step, display);
        }
        if (result.exitCode !== 0) {
            throw BootstrapError.commandFailed(step, display, result.exitCode);
        }
        return result.output;
    }

    private advance(state: BootstrapState, detail: string): void {
        this.transitions.push(state);
        logger.debug(`Bootstrap state: ${state} (${detail})`);
        this.onTransition(state, detail);
    }
}
