// packages/cli/src/cli/commands/index.ts

export { handleBootstrapCommand, type BootstrapCommandDeps } from './bootstrap.js';
export { handleServeCommand, type ServeCommandOptions } from './serve.js';
export {
    handleReportCommand,
    type ReportCommandOptions,
    type ReportCommandDeps,
    type TerminalReport,
} from './report.js';
export {
    handleTargetsInitCommand,
    type TargetsInitCommandOptions,
    type TargetsInitResult,
} from './targets.js';
