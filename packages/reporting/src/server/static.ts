import { Hono } from 'hono';
import { readFile } from 'fs/promises';
import { extname, join, normalize, sep } from 'path';

const CONTENT_TYPES: Record<string, string> = {
    '.js': 'application/javascript',
    '.css': 'text/css',
    '.svg': 'image/svg+xml',
    '.png': 'image/png',
    '.ico': 'image/x-icon',
    '.json': 'application/json',
    '.woff2': 'font/woff2',
};

const FALLBACK_HTML = `<!DOCTYPE html>
<html>
<head><title>Pulseboard</title></head>
<body>
<h1>Pulseboard API</h1>
<p>The dashboard UI has not been built. Run <code>npm run dashboard:build</code>, or use the API at <code>/api/*</code>.</p>
</body>
</html>`;

/**
 * Absolute path of an asset under `assetsRoot`, or null when the relative path climbs out of it.
 */
export function resolveAssetPath(assetsRoot: string, relativePath: string): string | null {
    const assetPath = normalize(join(assetsRoot, relativePath));
    return assetPath.startsWith(assetsRoot + sep) ? assetPath : null;
}

/**
 * Serves the built React dashboard: `index.html` at `/` and bundled files under `/assets/`.
 */
export function createStaticRouter(webRoot: string) {
    const app = new Hono();

    app.get('/', async (c) => {
        try {
            return c.html(await readFile(join(webRoot, 'index.html'), 'utf-8'));
        } catch {
            return c.html(FALLBACK_HTML, 200);
        }
    });

    app.get('/assets/*', async (c) => {
        const assetsRoot = join(webRoot, 'assets');
        const assetPath = resolveAssetPath(assetsRoot, c.req.path.slice('/assets/'.length));
        if (assetPath === null) {
            return c.notFound();
        }
        try {
            const content = await readFile(assetPath);
            c.header('Content-Type', CONTENT_TYPES[extname(assetPath)] ?? 'application/octet-stream');
            return c.body(content);
        } catch {
            return c.notFound();
        }
    });

    return app;
}
