import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { parseManifest, readManifest } from './manifest.js';
import { BootstrapError } from './errors.js';

describe('parseManifest', () => {
    it('keeps one specifier per line and drops comments and blanks', () => {
        const content = 'hono@4.6.3\n# comment\n\n  zod  # pinned later\r\nreact#18\n';

        expect(parseManifest(content)).toEqual(['hono@4.6.3', 'zod', 'react#18']);
    });

    it('returns nothing for a comment-only manifest', () => {
        expect(parseManifest('# nothing yet\n\n')).toEqual([]);
    });
});

describe('readManifest', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'pulseboard-manifest-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('reads the packages from disk', async () => {
        const manifest = path.join(tempDir, 'runtime-requirements.txt');
        await fs.writeFile(manifest, 'hono\nyaml\n');

        await expect(readManifest(manifest)).resolves.toEqual(['hono', 'yaml']);
    });

    it('reports a missing manifest with exit code 1', async () => {
        const manifest = path.join(tempDir, 'missing.txt');

        const error = await readManifest(manifest).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(BootstrapError);
        expect(error).toMatchObject({ code: 'bootstrap_manifest_not_found', exitCode: 1 });
    });

    it('treats an empty manifest as a user error', async () => {
        const manifest = path.join(tempDir, 'empty.txt');
        await fs.writeFile(manifest, '# only a comment\n');

        await expect(readManifest(manifest)).rejects.toMatchObject({
            code: 'bootstrap_manifest_empty',
            type: 'user',
            exitCode: 1,
        });
    });
});
