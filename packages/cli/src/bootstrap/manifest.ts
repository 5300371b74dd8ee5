import { promises as fs } from 'fs';
import { BootstrapError } from './errors.js';

/**
 * One package specifier per line. Blank lines, whole-line `#` comments and trailing
 * ` # comments` are dropped.
 */
export function parseManifest(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.replace(/(^|\s)#.*$/, '').trim())
        .filter((line) => line.length > 0);
}

/**
 * @throws BootstrapError when the file is missing or lists nothing
 */
export async function readManifest(manifestPath: string): Promise<string[]> {
    let content: string;
    try {
        content = await fs.readFile(manifestPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw BootstrapError.manifestNotFound(manifestPath);
        }
        throw error;
    }

    const packages = parseManifest(content);
    if (packages.length === 0) {
        throw BootstrapError.manifestEmpty(manifestPath);
    }
    return packages;
}
