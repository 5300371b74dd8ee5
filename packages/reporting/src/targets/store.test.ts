import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { parse as parseYaml } from 'yaml';
import { PulseboardValidationError } from '@pulseboard/core';
import { TargetsStore } from './store.js';
import { DEFAULT_TEAM_TARGETS } from './schemas.js';
import { TargetsErrorCode } from './error-codes.js';

describe('TargetsStore', () => {
    let tempDir: string;
    let targetsPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'pulseboard-targets-test-'));
        targetsPath = path.join(tempDir, 'targets.yml');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('uses defaults when the file does not exist', async () => {
        const store = await TargetsStore.open(targetsPath);

        expect(store.resolve(['Growth'])).toEqual({ Growth: { ...DEFAULT_TEAM_TARGETS } });
    });

    it('merges stored fields over defaults', async () => {
        await fs.writeFile(
            targetsPath,
            'teams:\n  Growth:\n    revenueTarget: 300000\n    profitabilityTargetPct: 40\n',
            'utf-8'
        );

        const store = await TargetsStore.open(targetsPath);

        expect(store.resolve(['Growth', 'Delivery'])).toEqual({
            Growth: {
                revenueTarget: 300000,
                collectionTarget: 200000,
                utilizationTargetHours: 1800,
                profitabilityTargetPct: 40,
            },
            Delivery: { ...DEFAULT_TEAM_TARGETS },
        });
    });

    it('treats an empty file as no overrides', async () => {
        await fs.writeFile(targetsPath, '', 'utf-8');

        const store = await TargetsStore.open(targetsPath);

        expect(store.get('Growth')).toEqual({ ...DEFAULT_TEAM_TARGETS });
    });

    it('rejects negative targets in the file', async () => {
        await fs.writeFile(targetsPath, 'teams:\n  Growth:\n    revenueTarget: -1\n', 'utf-8');

        await expect(TargetsStore.open(targetsPath)).rejects.toBeInstanceOf(
            PulseboardValidationError
        );
    });

    it('persists a validated partial update', async () => {
        const store = await TargetsStore.open(targetsPath);

        const updated = await store.update('Growth', { collectionTarget: 150000 });

        expect(updated.collectionTarget).toBe(150000);
        expect(updated.revenueTarget).toBe(250000);
        const written = parseYaml(await fs.readFile(targetsPath, 'utf-8'));
        expect(written).toEqual({ teams: { Growth: { collectionTarget: 150000 } } });

        const reopened = await TargetsStore.open(targetsPath);
        expect(reopened.get('Growth').collectionTarget).toBe(150000);
    });

    it('rejects invalid updates without writing', async () => {
        const store = await TargetsStore.open(targetsPath);

        let caught: unknown;
        try {
            await store.update('Growth', { revenueTarget: -5 });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(PulseboardValidationError);
        if (caught instanceof PulseboardValidationError) {
            expect(caught.issues[0]?.code).toBe(TargetsErrorCode.VALIDATION_ERROR);
            expect(caught.issues[0]?.message).toBe(
                'revenueTarget: Number must be greater than or equal to 0'
            );
        }
        await expect(fs.access(targetsPath)).rejects.toThrow();
    });

    it('rejects an empty update', async () => {
        const store = await TargetsStore.open(targetsPath);

        await expect(store.update('Growth', {})).rejects.toThrow(
            'At least one target must be provided'
        );
    });

    it('refuses a team name that cannot be stored', async () => {
        const store = await TargetsStore.open(targetsPath);

        await expect(store.update('__proto__', { revenueTarget: 1 })).rejects.toBeInstanceOf(
            PulseboardValidationError
        );
        await expect(fs.access(targetsPath)).rejects.toThrow();
        expect(store.get('Growth').revenueTarget).toBe(250000);
    });

    it('stores teams named after object members', async () => {
        const store = await TargetsStore.open(targetsPath);

        expect(await store.initialize(['constructor'])).toEqual(['constructor']);
        await store.update('toString', { revenueTarget: 7 });

        const reopened = await TargetsStore.open(targetsPath);
        expect(reopened.get('constructor')).toEqual({ ...DEFAULT_TEAM_TARGETS });
        expect(reopened.get('toString').revenueTarget).toBe(7);
    });

    it('resolves a team from the data named __proto__ as an own entry', async () => {
        const store = await TargetsStore.open(targetsPath);

        const resolved = store.resolve(['__proto__', 'Growth']);

        expect(Object.keys(resolved)).toEqual(['__proto__', 'Growth']);
        expect(Object.getPrototypeOf(resolved)).toBe(Object.prototype);
        expect(resolved['__proto__']).toEqual({ ...DEFAULT_TEAM_TARGETS });
    });

    it('initializes only teams without targets', async () => {
        const store = await TargetsStore.open(targetsPath);
        await store.update('Growth', { revenueTarget: 1 });

        const added = await store.initialize(['Growth', 'Delivery']);

        expect(added).toEqual(['Delivery']);
        expect(store.get('Growth').revenueTarget).toBe(1);
        expect(store.get('Delivery')).toEqual({ ...DEFAULT_TEAM_TARGETS });
    });
});
