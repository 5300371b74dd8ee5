import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';

vi.mock('@clack/prompts', () => ({
    intro: vi.fn(),
    outro: vi.fn(),
    note: vi.fn(),
    log: { success: vi.fn(), error: vi.fn(), info: vi.fn() },
}));

import * as p from '@clack/prompts';
import { handleBootstrapCommand } from './bootstrap.js';
import type { CommandRunner } from '../../bootstrap/index.js';

function runner(exitCodeFor: (args: string[]) => number): CommandRunner {
    return {
        run: async (spec) => ({
            exitCode: exitCodeFor(spec.args),
            output: spec.args[0] === '-e' ? 'OK 4.6.3\n' : '',
        }),
    };
}

describe('bootstrap command', () => {
    let root: string;

    beforeEach(async () => {
        vi.clearAllMocks();
        root = await fs.mkdtemp(path.join(tmpdir(), 'pulseboard-bootstrap-cmd-test-'));
        await fs.writeFile(path.join(root, 'runtime-requirements.txt'), 'hono\n');
        await fs.mkdir(path.join(root, '.package-cache'));
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('returns 0 once the environment is verified', async () => {
        const code = await handleBootstrapCommand(
            { root },
            { runner: runner(() => 0), platform: 'linux' }
        );

        expect(code).toBe(0);
        expect(p.log.success).toHaveBeenCalledTimes(6);
        expect(p.outro).toHaveBeenCalledWith(expect.stringContaining('OK 4.6.3'));
    });

    it('returns the failing command exit code', async () => {
        const code = await handleBootstrapCommand(
            { root },
            {
                runner: runner((args) => (args.includes('--offline') ? 3 : 0)),
                platform: 'linux',
            }
        );

        expect(code).toBe(3);
        expect(p.log.error).toHaveBeenCalledTimes(1);
    });

    it('returns 1 for invalid options', async () => {
        const code = await handleBootstrapCommand(
            { root, toolchain: 'ruby' },
            { runner: runner(() => 0), platform: 'linux' }
        );

        expect(code).toBe(1);
    });
});
