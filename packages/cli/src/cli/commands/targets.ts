import chalk from 'chalk';
import * as p from '@clack/prompts';
import { z } from 'zod';
import { DataConnector } from '@pulseboard/core';
import {
    ReportService,
    TargetsStore,
    loadServerConfig,
    type DatasetLoader,
} from '@pulseboard/reporting';

const TargetsInitCommandSchema = z
    .object({
        targets: z.string().min(1).optional(),
    })
    .strict();

export type TargetsInitCommandOptions = z.output<typeof TargetsInitCommandSchema>;

export interface TargetsInitResult {
    filePath: string;
    added: string[];
}

/**
 * Write default targets for every team in the current dataset that has none yet.
 * Existing entries are left untouched.
 */
export async function handleTargetsInitCommand(
    options: TargetsInitCommandOptions,
    deps: { loader?: DatasetLoader } = {}
): Promise<TargetsInitResult> {
    const validated = TargetsInitCommandSchema.parse(options);
    const { targetsFile } = loadServerConfig({ targetsFile: validated.targets });

    p.intro(chalk.inverse('Pulseboard Targets'));
    const spinner = p.spinner();
    spinner.start('Loading teams');

    const store = await TargetsStore.open(targetsFile);
    const service = new ReportService(deps.loader ?? new DataConnector(), store);
    const teams = await service.teams();
    const added = await store.initialize(teams);
    spinner.stop(`Found ${teams.length} teams`);

    if (added.length === 0) {
        p.outro(`Every team already has targets in ${chalk.cyan(store.getFilePath())}`);
    } else {
        p.outro(
            `Added default targets for ${added.join(', ')} to ${chalk.cyan(store.getFilePath())}`
        );
    }
    return { filePath: store.getFilePath(), added };
}
