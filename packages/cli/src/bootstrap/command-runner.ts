import spawn from 'cross-spawn';
import { COMMAND_NOT_FOUND_EXIT_CODE } from './errors.js';
import type { CommandResult, CommandSpec } from './types.js';

export interface CommandRunner {
    run(spec: CommandSpec): Promise<CommandResult>;
}

export interface SpawnRunnerOptions {
    /** Receives output as it arrives; defaults to the parent's stdout and stderr */
    onStdout?: (chunk: string) => void;
    onStderr?: (chunk: string) => void;
}

/**
 * Runs commands as child processes, streaming their output while also capturing it.
 * Never rejects: a command that cannot be spawned resolves with exit code 127.
 *
 * cross-spawn resolves `.cmd` shims such as `npm.cmd` on Windows and escapes every
 * argument for `cmd.exe`, so inline scripts and paths with spaces arrive intact.
 */
export function createSpawnRunner(options: SpawnRunnerOptions = {}): CommandRunner {
    const onStdout = options.onStdout ?? ((chunk: string) => process.stdout.write(chunk));
    const onStderr = options.onStderr ?? ((chunk: string) => process.stderr.write(chunk));

    return {
        run(spec: CommandSpec): Promise<CommandResult> {
            return new Promise((resolve) => {
                let output = '';
                let settled = false;
                const finish = (exitCode: number) => {
                    if (settled) return;
                    settled = true;
                    resolve({ exitCode, output });
                };

                const child = spawn(spec.command, spec.args, {
                    cwd: spec.cwd,
                    env: spec.env,
                    stdio: ['ignore', 'pipe', 'pipe'],
                });

                child.stdout?.on('data', (data: Buffer) => {
                    const text = data.toString();
                    output += text;
                    onStdout(text);
                });
                child.stderr?.on('data', (data: Buffer) => {
                    const text = data.toString();
                    output += text;
                    onStderr(text);
                });

                child.on('error', (error) => {
                    output += `${error.message}\n`;
                    finish(COMMAND_NOT_FOUND_EXIT_CODE);
                });
                child.on('close', (code) => {
                    finish(code ?? 1);
                });
            });
        },
    };
}

export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
    return [spec.command, ...spec.args]
        .map((part) => (/\s/.test(part) ? JSON.stringify(part) : part))
        .join(' ');
}
