import chalk from 'chalk';
import * as p from '@clack/prompts';
import {
    Bootstrapper,
    BootstrapError,
    createSpawnRunner,
    resolveBootstrapPlan,
    type BootstrapPlan,
    type CommandRunner,
} from '../../bootstrap/index.js';

export interface BootstrapCommandDeps {
    runner?: CommandRunner;
    cwd?: string;
    platform?: NodeJS.Platform;
}

function describePlan(plan: BootstrapPlan): string {
    return [
        `Toolchain:   ${plan.toolchain}`,
        `Environment: ${plan.envDir}`,
        `Manifest:    ${plan.manifestPath}`,
        `Cache:       ${plan.cacheDir}`,
        `Verify:      ${plan.verifyPackage}`,
    ].join('\n');
}

/**
 * Provision the isolated runtime environment.
 * @returns Process exit code: 0 once Verified, otherwise the aborting step's code
 */
export async function handleBootstrapCommand(
    options: Record<string, unknown>,
    deps: BootstrapCommandDeps = {}
): Promise<number> {
    p.intro(chalk.inverse('Pulseboard Bootstrap'));

    try {
        const plan = resolveBootstrapPlan(options, deps.cwd, deps.platform);
        p.note(describePlan(plan), 'Plan');

        const bootstrapper = new Bootstrapper(plan, {
            runner: deps.runner ?? createSpawnRunner(),
            platform: deps.platform,
            onTransition: (state, detail) => p.log.success(`${chalk.bold(state)} ${detail}`),
        });
        const result = await bootstrapper.run();

        p.outro(chalk.green(`OK ${result.version}`));
        return 0;
    } catch (error) {
        if (error instanceof BootstrapError) {
            p.log.error(error.message);
            if (typeof error.recovery === 'string') {
                p.log.info(chalk.gray(error.recovery));
            }
            p.outro(chalk.red(`Bootstrap aborted (exit code ${error.exitCode})`));
            return error.exitCode;
        }
        throw error;
    }
}
