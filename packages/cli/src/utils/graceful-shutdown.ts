import { logger } from '@pulseboard/core';

/**
 * Stop the given service and exit on SIGINT, SIGTERM or SIGUSR2.
 * Uncaught exceptions and unhandled rejections also stop it, then exit with 1.
 */
export function registerGracefulShutdown(stop: () => Promise<void>): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGUSR2'];
    let isShuttingDown = false;

    const shutdown = async (reason: string, exitCode: number) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info(`Received ${reason}, shutting down gracefully...`);
        try {
            await stop();
            process.exit(exitCode);
        } catch (error) {
            logger.error(
                `Shutdown error: ${error instanceof Error ? error.message : String(error)}`,
                { error: error instanceof Error ? error.message : String(error) }
            );
            process.exit(1);
        }
    };

    signals.forEach((signal) => {
        process.on(signal, () => void shutdown(signal, 0));
    });

    process.on('uncaughtException', (error) => {
        logger.error(`Uncaught exception: ${error.message}`, { stack: error.stack }, 'red');
        void shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        logger.error(`Unhandled rejection: ${String(reason)}`, undefined, 'red');
        void shutdown('unhandledRejection', 1);
    });
}
