/**
 * Standalone dashboard server: loads the dataset, serves the reporting API and the built UI.
 *
 * Run: pulseboard serve (or pulseboard-dashboard)
 */

import { serve, type ServerType } from '@hono/node-server';
import { DataConnector, logger } from '@pulseboard/core';
import { ReportService, type DatasetLoader } from '../api/report-service.js';
import { loadServerConfig, type ServerConfigOverrides } from '../config/loader.js';
import { TargetsStore } from '../targets/store.js';
import { createPulseboardApp, DEFAULT_WEB_ROOT, type PulseboardApp } from './app.js';

export interface DashboardServerOptions extends ServerConfigOverrides {
    /** Data source; defaults to a DataConnector configured from the environment */
    loader?: DatasetLoader;
    webRoot?: string;
}

export interface DashboardServer {
    server: ServerType;
    app: PulseboardApp;
    service: ReportService;
    url: string;
    stop: () => Promise<void>;
}

export async function startDashboardServer(
    options: DashboardServerOptions = {}
): Promise<DashboardServer> {
    const config = loadServerConfig(options);
    const targets = await TargetsStore.open(config.targetsFile);
    const service = new ReportService(options.loader ?? new DataConnector(), targets);

    // Load before listening so the first page view is not a cold start
    const dataset = await service.getDataset();
    if (dataset.fallbackReason) {
        logger.warn(`Serving demo data: ${dataset.fallbackReason}`);
    }

    const app = createPulseboardApp({ service, webRoot: options.webRoot ?? DEFAULT_WEB_ROOT });
    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.hostname });
    const url = `http://localhost:${config.port}`;

    logger.info(`Dashboard running at ${url}`, undefined, 'green');
    logger.info(`Targets file: ${targets.getFilePath()}`);

    return {
        server,
        app,
        service,
        url,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                logger.info('Stopping dashboard server...');
                server.close((error) => (error ? reject(error) : resolve()));
            }),
    };
}
