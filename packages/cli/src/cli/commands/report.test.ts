import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { handleReportCommand } from './report.js';
import { smallLoader } from './test-fixtures.js';

describe('report command', () => {
    let tempDir: string;
    let targetsFile: string;
    let printed: string[];
    const print = (text: string) => {
        printed.push(text);
    };

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'pulseboard-report-test-'));
        targetsFile = path.join(tempDir, 'targets.yml');
        printed = [];
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('prints the summary and scorecard as JSON', async () => {
        await handleReportCommand(
            { format: 'json', targets: targetsFile },
            { loader: smallLoader, print }
        );

        expect(printed).toHaveLength(1);
        const output = JSON.parse(printed[0] ?? '');
        expect(output.summary.totalBilled).toBe(1000);
        expect(output.summary.moneyCollected).toBe(600);
        expect(output.scorecard.map((row: { team: string }) => row.team)).toEqual([
            'Delivery',
            'Growth',
        ]);
        expect(output.scorecard[0].collectedEstimate).toBeCloseTo(400);
        expect(output.scorecard[0].revenueVsTargetPct).toBeCloseTo(0.8);
    });

    it('prints a box, a heading and the table by default', async () => {
        const report = await handleReportCommand(
            { targets: targetsFile },
            { loader: smallLoader, print }
        );

        expect(printed).toHaveLength(3);
        expect(printed[0]).toContain('Total billed:        $1,000');
        expect(printed[2]?.split('\n')).toHaveLength(4);
        expect(report.summary.averageDealMargin).toBeCloseTo(57.5);
    });

    it('uses stored targets', async () => {
        await fs.writeFile(targetsFile, 'teams:\n  Growth:\n    revenueTarget: 2000\n');

        const report = await handleReportCommand(
            { format: 'json', targets: targetsFile },
            { loader: smallLoader, print }
        );

        const growth = report.scorecard.find((row) => row.team === 'Growth');
        expect(growth?.revenueVsTargetPct).toBeCloseTo(50);
    });
});
