import boxen from 'boxen';
import chalk from 'chalk';
import { z } from 'zod';
import { startDashboardServer, type DashboardServer } from '@pulseboard/reporting';
import { registerGracefulShutdown } from '../../utils/graceful-shutdown.js';

const ServeCommandSchema = z
    .object({
        port: z.string().min(1).optional(),
        targets: z.string().min(1).optional(),
    })
    .strict();

export type ServeCommandOptions = z.output<typeof ServeCommandSchema>;

export async function handleServeCommand(options: ServeCommandOptions): Promise<DashboardServer> {
    const validated = ServeCommandSchema.parse(options);
    const dashboard = await startDashboardServer({
        port: validated.port,
        targetsFile: validated.targets,
    });
    registerGracefulShutdown(dashboard.stop);

    console.log(
        boxen(
            `${chalk.bold('Pulseboard dashboard')}\n\n` +
                `${chalk.cyan(dashboard.url)}\n` +
                `${chalk.gray(`API docs: ${dashboard.url}/openapi.json`)}`,
            { padding: 1, borderColor: 'cyan', borderStyle: 'round' }
        )
    );
    return dashboard;
}
