export { Bootstrapper, resolveBootstrapPlan, defaultPython } from './bootstrapper.js';
export type { BootstrapperOptions } from './bootstrapper.js';
export { createSpawnRunner, formatCommand } from './command-runner.js';
export type { CommandRunner, SpawnRunnerOptions } from './command-runner.js';
export { BootstrapError, COMMAND_NOT_FOUND_EXIT_CODE } from './errors.js';
export { BootstrapErrorCode } from './error-codes.js';
export { parseManifest, readManifest } from './manifest.js';
export { getToolchain, createNodeToolchain, createPythonToolchain } from './toolchains.js';
export type { Toolchain, ToolchainDefaults } from './toolchains.js';
export { BOOTSTRAP_STATES, BootstrapOptionsSchema, TOOLCHAINS } from './types.js';
export type {
    BootstrapOptions,
    BootstrapOptionsInput,
    BootstrapPlan,
    BootstrapResult,
    BootstrapState,
    CommandResult,
    CommandSpec,
    ToolchainName,
} from './types.js';
