import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getGlobalEnvPath, getPulseboardPath } from './path.js';

describe('getPulseboardPath', () => {
    let previous: string | undefined;

    beforeEach(() => {
        previous = process.env.PULSEBOARD_HOME;
        process.env.PULSEBOARD_HOME = path.join('/tmp', 'pulseboard-home');
    });

    afterEach(() => {
        if (previous === undefined) {
            delete process.env.PULSEBOARD_HOME;
        } else {
            process.env.PULSEBOARD_HOME = previous;
        }
    });

    it('joins type and filename under the home directory', () => {
        expect(getPulseboardPath('logs', 'pulseboard.log')).toBe(
            path.join('/tmp', 'pulseboard-home', 'logs', 'pulseboard.log')
        );
    });

    it('points the global env file at the home directory', () => {
        expect(getGlobalEnvPath()).toBe(path.join('/tmp', 'pulseboard-home', '.env'));
    });
});
