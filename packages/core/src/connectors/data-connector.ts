import { logger } from '../logger/index.js';
import { hasLiveCredentials, loadConnectorConfig } from '../config/loader.js';
import type { ConnectorConfig } from '../config/schemas.js';
import type { Dataset } from '../data/types.js';
import { generateDemoData } from './demo.js';
import { HarvestClient } from './harvest.js';
import type { FetchFn } from './http.js';
import { MondayClient } from './monday.js';
import { XeroClient } from './xero.js';

export interface DataConnectorOptions {
    config?: ConnectorConfig;
    fetch?: FetchFn;
    now?: () => Date;
    demoSeed?: number;
}

/**
 * Loads deals (monday.com), time entries (Harvest) and invoices (Xero).
 * Falls back to generated demo data when credentials are missing or any source fails,
 * so the dashboard always has something to show.
 */
export class DataConnector {
    private readonly config: ConnectorConfig;
    private readonly now: () => Date;

    constructor(private readonly options: DataConnectorOptions = {}) {
        this.config = options.config ?? loadConnectorConfig();
        this.now = options.now ?? (() => new Date());
    }

    async loadData(): Promise<Dataset> {
        if (!hasLiveCredentials(this.config)) {
            logger.info('Connector credentials incomplete, serving demo data');
            return this.demoData('credentials for monday.com, Harvest and Xero are not all set');
        }

        try {
            const [deals, timeEntries, invoices] = await Promise.all([
                this.mondayClient().fetchDeals(),
                this.harvestClient().fetchTimeEntries(),
                this.xeroClient().fetchInvoices(),
            ]);
            logger.info(
                `Loaded live data: ${deals.length} deals, ${timeEntries.length} time entries, ${invoices.length} invoices`
            );
            return {
                deals,
                timeEntries,
                invoices,
                source: 'live',
                loadedAt: this.now().toISOString(),
            };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.warn(`Live data load failed, serving demo data instead: ${reason}`);
            return this.demoData(reason);
        }
    }

    private demoData(reason: string): Dataset {
        const demo = generateDemoData({
            seed: this.options.demoSeed,
            referenceDate: this.now(),
        });
        return {
            ...demo,
            source: 'demo',
            loadedAt: this.now().toISOString(),
            fallbackReason: reason,
        };
    }

    private mondayClient(): MondayClient {
        return new MondayClient({
            token: this.config.mondayToken ?? '',
            boardId: this.config.mondayBoardId,
            timeoutMs: this.config.timeoutMs,
            fetch: this.options.fetch,
        });
    }

    private harvestClient(): HarvestClient {
        return new HarvestClient({
            token: this.config.harvestToken ?? '',
            accountId: this.config.harvestAccountId,
            timeoutMs: this.config.timeoutMs,
            fetch: this.options.fetch,
            now: this.now,
        });
    }

    private xeroClient(): XeroClient {
        return new XeroClient({
            token: this.config.xeroToken ?? '',
            tenantId: this.config.xeroTenantId,
            timeoutMs: this.config.timeoutMs,
            fetch: this.options.fetch,
        });
    }
}
