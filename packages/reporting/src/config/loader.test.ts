import { describe, it, expect } from 'vitest';
import { PulseboardValidationError } from '@pulseboard/core';
import { loadServerConfig } from './loader.js';

describe('loadServerConfig', () => {
    it('defaults port and targets file', () => {
        expect(loadServerConfig({}, {})).toEqual({
            port: 3002,
            hostname: '0.0.0.0',
            targetsFile: './pulseboard-targets.yml',
        });
    });

    it('reads environment variables', () => {
        const config = loadServerConfig(
            {},
            { PULSEBOARD_PORT: '4100', PULSEBOARD_TARGETS_FILE: '/tmp/targets.yml' }
        );

        expect(config.port).toBe(4100);
        expect(config.targetsFile).toBe('/tmp/targets.yml');
    });

    it('prefers explicit options', () => {
        const config = loadServerConfig({ port: 5000 }, { PULSEBOARD_PORT: '4100' });

        expect(config.port).toBe(5000);
    });

    it('rejects an out of range port', () => {
        expect(() => loadServerConfig({}, { PULSEBOARD_PORT: '70000' })).toThrow(
            PulseboardValidationError
        );
    });
});
