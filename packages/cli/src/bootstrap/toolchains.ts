import path from 'path';
import type { BootstrapPlan, CommandSpec, ToolchainName } from './types.js';

export interface ToolchainDefaults {
    envDir: string;
    manifest: string;
    cacheDir: string;
    verifyPackage: string;
}

/**
 * Everything that differs between toolchains. Each step of the bootstrapper asks the
 * toolchain for its command; the bootstrapper owns ordering and failure handling.
 */
export interface Toolchain {
    name: ToolchainName;
    defaults: ToolchainDefaults;
    /** Command that creates the environment, or null when a plain directory is enough */
    createEnv(plan: BootstrapPlan, env: NodeJS.ProcessEnv): CommandSpec | null;
    /** Environment for every later step, with the isolated environment activated */
    activate(plan: BootstrapPlan, env: NodeJS.ProcessEnv): NodeJS.ProcessEnv;
    upgradeInstaller(plan: BootstrapPlan, env: NodeJS.ProcessEnv): CommandSpec;
    install(plan: BootstrapPlan, packages: string[], env: NodeJS.ProcessEnv): CommandSpec;
    verify(plan: BootstrapPlan, env: NodeJS.ProcessEnv): CommandSpec;
}

function prependPath(env: NodeJS.ProcessEnv, dir: string, platform: NodeJS.Platform) {
    const delimiter = platform === 'win32' ? ';' : ':';
    // Windows spells it Path; keep whichever key is already there
    const key = Object.keys(env).find((k) => k.toUpperCase() === 'PATH') ?? 'PATH';
    const current = env[key];
    return { ...env, [key]: current ? `${dir}${delimiter}${current}` : dir };
}

function npmCommand(platform: NodeJS.Platform): string {
    return platform === 'win32' ? 'npm.cmd' : 'npm';
}

// Resolves and loads the package from the environment, then prints its version
function nodeVerifyScript(pkg: string): string {
    const name = JSON.stringify(pkg);
    return [
        "const fs = require('fs');",
        "const path = require('path');",
        "const load = require('module').createRequire(path.join(process.cwd(), 'index.js'));",
        `load(${name});`,
        `const manifest = path.join(process.cwd(), 'node_modules', ${name}, 'package.json');`,
        "console.log('OK ' + JSON.parse(fs.readFileSync(manifest, 'utf8')).version);",
    ].join(' ');
}

function pythonVerifyScript(pkg: string): string {
    return [
        'import importlib',
        `m = importlib.import_module(${JSON.stringify(pkg)})`,
        "print('OK ' + str(getattr(m, '__version__', '')))",
    ].join('; ');
}

export function createNodeToolchain(platform: NodeJS.Platform = process.platform): Toolchain {
    return {
        name: 'node',
        defaults: {
            envDir: '.runtime',
            manifest: 'runtime-requirements.txt',
            cacheDir: '.package-cache',
            verifyPackage: 'hono',
        },
        createEnv: () => null,
        activate: (plan, env) =>
            prependPath(env, path.join(plan.envDir, 'node_modules', '.bin'), platform),
        upgradeInstaller: (plan, env) => ({
            command: npmCommand(platform),
            args: ['install', '--prefix', plan.envDir, '--no-audit', '--no-fund', 'npm@latest'],
            cwd: plan.root,
            env,
        }),
        install: (plan, packages, env) => ({
            command: npmCommand(platform),
            args: [
                'install',
                '--offline',
                '--cache',
                plan.cacheDir,
                '--prefix',
                plan.envDir,
                '--no-audit',
                '--no-fund',
                ...packages,
            ],
            cwd: plan.root,
            env,
        }),
        verify: (plan, env) => ({
            command: 'node',
            args: ['-e', nodeVerifyScript(plan.verifyPackage)],
            cwd: plan.envDir,
            env,
        }),
    };
}

export function createPythonToolchain(platform: NodeJS.Platform = process.platform): Toolchain {
    const binDir = (plan: BootstrapPlan) =>
        path.join(plan.envDir, platform === 'win32' ? 'Scripts' : 'bin');
    const envPython = (plan: BootstrapPlan) =>
        path.join(binDir(plan), platform === 'win32' ? 'python.exe' : 'python');

    return {
        name: 'python',
        defaults: {
            envDir: '.venv',
            manifest: 'requirements.txt',
            cacheDir: 'wheels',
            verifyPackage: 'streamlit',
        },
        createEnv: (plan, env) => ({
            command: plan.python,
            args: ['-m', 'venv', plan.envDir],
            cwd: plan.root,
            env,
        }),
        activate: (plan, env) => {
            const activated = prependPath(env, binDir(plan), platform);
            delete activated.PYTHONHOME;
            return { ...activated, VIRTUAL_ENV: plan.envDir };
        },
        upgradeInstaller: (plan, env) => ({
            command: envPython(plan),
            args: ['-m', 'pip', 'install', '--upgrade', 'pip'],
            cwd: plan.root,
            env,
        }),
        install: (plan, _packages, env) => ({
            command: envPython(plan),
            args: [
                '-m',
                'pip',
                'install',
                '--no-index',
                '--find-links',
                plan.cacheDir,
                '-r',
                plan.manifestPath,
            ],
            cwd: plan.root,
            env,
        }),
        verify: (plan, env) => ({
            command: envPython(plan),
            args: ['-c', pythonVerifyScript(plan.verifyPackage)],
            cwd: plan.root,
            env,
        }),
    };
}

export function getToolchain(
    name: ToolchainName,
    platform: NodeJS.Platform = process.platform
): Toolchain {
    return name === 'node' ? createNodeToolchain(platform) : createPythonToolchain(platform);
}
