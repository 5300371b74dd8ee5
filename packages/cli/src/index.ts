#!/usr/bin/env node
// Load environment variables FIRST with layered loading
import { applyLayeredEnvironmentLoading } from './utils/env.js';

applyLayeredEnvironmentLoading();

import { createRequire } from 'module';
import { Command } from 'commander';
import chalk from 'chalk';
import { CONNECTOR_ENV_VARS, logger, PulseboardValidationError } from '@pulseboard/core';
import {
    handleBootstrapCommand,
    handleReportCommand,
    handleServeCommand,
    handleTargetsInitCommand,
} from './cli/commands/index.js';

// Use createRequire to import package.json without experimental warning
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

function reportFailure(command: string, err: unknown): void {
    if (err instanceof PulseboardValidationError) {
        for (const issue of err.issues) {
            console.error(chalk.red(`❌ ${issue.message}`));
        }
    } else {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`pulseboard ${command} failed: ${message}`);
    }
    process.exitCode = 1;
}

const envHelp = [
    '',
    'Environment variables (read from the shell, ./.env and ~/.pulseboard/.env):',
    ...Object.values(CONNECTOR_ENV_VARS).map((name) => `  ${name}`),
].join('\n');

const program = new Command();

// 1) GLOBAL OPTIONS
program
    .name('pulseboard')
    .description('Business dashboard over CRM deals, tracked time and invoices.')
    .version(pkg.version, '-v, --version', 'output the current version')
    .addHelpText('after', envHelp);

// 2) `bootstrap` SUB-COMMAND
program
    .command('bootstrap')
    .description('Provision the isolated runtime environment from the local package cache')
    .option('--toolchain <name>', 'Runtime toolchain: node | python')
    .option('--root <dir>', 'Project root that relative paths resolve against')
    .option('--env-dir <dir>', 'Environment directory')
    .option('--manifest <file>', 'Dependency manifest, one requirement per line')
    .option('--cache-dir <dir>', 'Local package cache the install reads from')
    .option('--verify <package>', 'Package that must import after install')
    .option('--python <command>', 'Interpreter used to create the virtual environment')
    .option('--skip-installer-upgrade', 'Do not upgrade the package installer')
    .action(async (options: Record<string, unknown>) => {
        try {
            process.exitCode = await handleBootstrapCommand(options);
        } catch (err) {
            reportFailure('bootstrap', err);
        }
    });

// 3) `serve` SUB-COMMAND
program
    .command('serve')
    .description('Start the dashboard server')
    .option('-p, --port <port>', 'Port to listen on (default: 3002)')
    .option('-t, --targets <file>', 'Targets file')
    .action(async (options: { port?: string; targets?: string }) => {
        try {
            await handleServeCommand(options);
        } catch (err) {
            reportFailure('serve', err);
        }
    });

// 4) `report` SUB-COMMAND
program
    .command('report')
    .description('Print the summary and team scorecard')
    .option('-f, --format <format>', 'Output format: table | json', 'table')
    .option('-t, --targets <file>', 'Targets file')
    .action(async (options: { format?: string; targets?: string }) => {
        try {
            await handleReportCommand(options);
        } catch (err) {
            reportFailure('report', err);
        }
    });

// 5) `targets` SUB-COMMAND
const targetsCommand = program.command('targets').description('Manage team targets');

targetsCommand
    .command('init')
    .description('Write default targets for every team that has none')
    .option('-t, --targets <file>', 'Targets file')
    .action(async (options: { targets?: string }) => {
        try {
            await handleTargetsInitCommand(options);
        } catch (err) {
            reportFailure('targets init', err);
        }
    });

// 6) PARSE & EXECUTE
await program.parseAsync(process.argv);
