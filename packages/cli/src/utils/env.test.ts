import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger } from '@pulseboard/core';
import { applyLayeredEnvironmentLoading, loadEnvironmentVariables } from './env.js';

describe('loadEnvironmentVariables', () => {
    let tempDir: string;
    let projectDir: string;
    let globalEnvPath: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(tmpdir(), 'pulseboard-env-test-'));
        projectDir = path.join(tempDir, 'project');
        fs.mkdirSync(projectDir);
        globalEnvPath = path.join(tempDir, 'home', '.env');
        fs.mkdirSync(path.dirname(globalEnvPath));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('layers global, project and shell values with the shell winning', () => {
        fs.writeFileSync(globalEnvPath, 'MONDAY_BOARD_ID=111\nPULSEBOARD_PORT=4000\n');
        fs.writeFileSync(
            path.join(projectDir, '.env'),
            'PULSEBOARD_PORT=5000\nHARVEST_ACCOUNT_ID=project-account\n'
        );

        const env = loadEnvironmentVariables({
            projectDir,
            globalEnvPath,
            shellEnv: { HARVEST_ACCOUNT_ID: 'shell-account' },
        });

        expect(env).toEqual({
            MONDAY_BOARD_ID: '111',
            PULSEBOARD_PORT: '5000',
            HARVEST_ACCOUNT_ID: 'shell-account',
        });
    });

    it('does not let empty shell values hide file values', () => {
        fs.writeFileSync(path.join(projectDir, '.env'), 'XERO_TENANT_ID=tenant-from-file\n');

        const env = loadEnvironmentVariables({
            projectDir,
            globalEnvPath,
            shellEnv: { XERO_TENANT_ID: '' },
        });

        expect(env.XERO_TENANT_ID).toBe('tenant-from-file');
    });

    it('works when neither env file exists', () => {
        const env = loadEnvironmentVariables({
            projectDir,
            globalEnvPath,
            shellEnv: { MONDAY_API_TOKEN: 'test-token' },
        });

        expect(env).toEqual({ MONDAY_API_TOKEN: 'test-token' });
    });
});

describe('applyLayeredEnvironmentLoading', () => {
    const keys = [
        'PULSEBOARD_HOME',
        'PULSEBOARD_LOG_FILE',
        'PULSEBOARD_LOG_LEVEL',
        'PULSEBOARD_LOG_TO_CONSOLE',
    ] as const;
    let saved: Record<string, string | undefined>;
    let tempDir: string;

    beforeEach(() => {
        saved = Object.fromEntries(keys.map((key) => [key, process.env[key]]));
        for (const key of keys) delete process.env[key];
        tempDir = fs.mkdtempSync(path.join(tmpdir(), 'pulseboard-env-apply-test-'));
        process.env.PULSEBOARD_HOME = path.join(tempDir, 'home');
    });

    afterEach(() => {
        for (const key of keys) {
            const value = saved[key];
            if (value === undefined) delete process.env[key];
            else process.env[key] = value;
        }
        logger.reconfigure();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('applies logging settings from the project .env to the shared logger', async () => {
        const logFile = path.join(tempDir, 'logs', 'cli.log');
        fs.writeFileSync(
            path.join(tempDir, '.env'),
            `PULSEBOARD_LOG_FILE=${logFile}\nPULSEBOARD_LOG_LEVEL=debug\n`
        );

        applyLayeredEnvironmentLoading(tempDir);

        expect(process.env.PULSEBOARD_LOG_FILE).toBe(logFile);
        expect(logger.getLogFilePath()).toBe(logFile);
        expect(logger.getLevel()).toBe('debug');
        await vi.waitFor(() => expect(fs.existsSync(logFile)).toBe(true));
    });
});
