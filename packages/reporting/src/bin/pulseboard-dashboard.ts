#!/usr/bin/env node
/**
 * CLI entry point for the dashboard server
 * Usage: pulseboard-dashboard
 */

import { logger } from '@pulseboard/core';
import { startDashboardServer } from '../server/dashboard-server.js';

startDashboardServer().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to start dashboard: ${message}`);
    process.exit(1);
});
