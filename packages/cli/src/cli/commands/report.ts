import boxen from 'boxen';
import chalk from 'chalk';
import { z } from 'zod';
import { DataConnector } from '@pulseboard/core';
import {
    ReportService,
    TargetsStore,
    loadServerConfig,
    type DatasetLoader,
    type ScorecardRow,
    type Summary,
} from '@pulseboard/reporting';
import { formatScorecardTable, formatSummaryLines } from './helpers/formatters.js';

const ReportCommandSchema = z
    .object({
        format: z.enum(['table', 'json']).default('table'),
        targets: z.string().min(1).optional(),
    })
    .strict();

/** Raw command-line options; validated by the handler */
export interface ReportCommandOptions {
    format?: string;
    targets?: string;
}

export interface ReportCommandDeps {
    loader?: DatasetLoader;
    print?: (text: string) => void;
}

export interface TerminalReport {
    summary: Summary;
    scorecard: ScorecardRow[];
}

/**
 * Print the summary and team scorecard, as boxed text or as JSON on stdout.
 */
export async function handleReportCommand(
    options: ReportCommandOptions,
    deps: ReportCommandDeps = {}
): Promise<TerminalReport> {
    const { format, targets } = ReportCommandSchema.parse(options);
    const print = deps.print ?? ((text: string) => console.log(text));

    const { targetsFile } = loadServerConfig({ targetsFile: targets });
    const store = await TargetsStore.open(targetsFile);
    const service = new ReportService(deps.loader ?? new DataConnector(), store);

    const report: TerminalReport = {
        summary: await service.summary(),
        scorecard: await service.scorecard(),
    };

    if (format === 'json') {
        print(JSON.stringify(report, null, 2));
        return report;
    }

    print(
        boxen(formatSummaryLines(report.summary).join('\n'), {
            padding: 1,
            borderColor: report.summary.source === 'live' ? 'green' : 'yellow',
            title: 'Pulseboard summary',
            titleAlignment: 'center',
        })
    );
    print(chalk.bold('\nTeam scorecard\n'));
    print(formatScorecardTable(report.scorecard));
    return report;
}
