import { OpenAPIHono } from '@hono/zod-openapi';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { createHealthRouter, createReportingRouter } from '../api/routes.js';
import type { ReportService } from '../api/report-service.js';
import { handleHonoError } from './error.js';
import { createStaticRouter } from './static.js';

export const DEFAULT_WEB_ROOT = join(
    dirname(fileURLToPath(import.meta.url)),
    '../../dashboard-ui'
);

export interface CreatePulseboardAppOptions {
    service: ReportService;
    /** Directory holding the built dashboard; omit to serve the API only */
    webRoot?: string;
}

export function createPulseboardApp({ service, webRoot }: CreatePulseboardAppOptions) {
    const app = new OpenAPIHono({ strict: false });

    app.onError((err, ctx) => handleHonoError(ctx, err));
    app.notFound((ctx) =>
        ctx.json(
            {
                code: 'route_not_found',
                message: `No route for ${ctx.req.method} ${ctx.req.path}`,
                scope: 'api',
                type: 'not_found',
                severity: 'error',
            },
            404
        )
    );

    const fullApp = app
        .route('/health', createHealthRouter(service))
        .route('/api', createReportingRouter(service));

    fullApp.doc('/openapi.json', {
        openapi: '3.0.0',
        info: {
            title: 'Pulseboard API',
            version: '0.1.0',
            description: 'Billing, time, profitability and scorecard reports',
        },
        tags: [
            { name: 'system', description: 'Health and dataset status' },
            { name: 'reports', description: 'Derived reports' },
            { name: 'targets', description: 'Per-team targets' },
            { name: 'data', description: 'Raw rows and reloads' },
        ],
    });

    if (webRoot) {
        fullApp.route('/', createStaticRouter(webRoot));
    }

    return fullApp;
}

export type PulseboardApp = ReturnType<typeof createPulseboardApp>;
