import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { parse as parseYaml } from 'yaml';

vi.mock('@clack/prompts', () => ({
    intro: vi.fn(),
    outro: vi.fn(),
    spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn() })),
}));

import { handleTargetsInitCommand } from './targets.js';
import { smallLoader } from './test-fixtures.js';

describe('targets init command', () => {
    let tempDir: string;
    let targetsFile: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'pulseboard-targets-cmd-test-'));
        targetsFile = path.join(tempDir, 'config', 'targets.yml');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('writes default targets for every team', async () => {
        const result = await handleTargetsInitCommand(
            { targets: targetsFile },
            { loader: smallLoader }
        );

        expect(result.added).toEqual(['Delivery', 'Growth']);
        const written = parseYaml(await fs.readFile(targetsFile, 'utf-8'));
        expect(written.teams.Delivery).toEqual({
            revenueTarget: 250000,
            collectionTarget: 200000,
            utilizationTargetHours: 1800,
            profitabilityTargetPct: 35,
        });
    });

    it('leaves existing entries alone', async () => {
        await fs.mkdir(path.dirname(targetsFile), { recursive: true });
        await fs.writeFile(targetsFile, 'teams:\n  Growth:\n    revenueTarget: 1\n');

        const result = await handleTargetsInitCommand(
            { targets: targetsFile },
            { loader: smallLoader }
        );

        expect(result.added).toEqual(['Delivery']);
        const written = parseYaml(await fs.readFile(targetsFile, 'utf-8'));
        expect(written.teams.Growth).toEqual({ revenueTarget: 1 });
    });

    it('adds nothing on a second run', async () => {
        await handleTargetsInitCommand({ targets: targetsFile }, { loader: smallLoader });

        const second = await handleTargetsInitCommand(
            { targets: targetsFile },
            { loader: smallLoader }
        );

        expect(second.added).toEqual([]);
    });
});
