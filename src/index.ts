/**
 * Weather ingestion daemon
 * Entry point
 */

import { ConfigError, EXIT_CONFIG_ERROR, loadConfig } from './config.js';
import { describeError } from './ingestion/errors.js';
import { logger } from './logger.js';
import { IngestionPipeline } from './pipeline.js';
import { loadLocations } from './weather/locations.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
        reason: describeError(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
        error: error.message,
        stack: error.stack,
    });
    process.exit(1);
});

async function main(): Promise<void> {
    let pipeline: IngestionPipeline;
    try {
        const config = loadConfig();
        const locations = loadLocations(config.locationsFile);
        pipeline = new IngestionPipeline(config, locations);
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.error(`Configuration error: ${error.message}`);
            process.exit(EXIT_CONFIG_ERROR);
        }
        throw error;
    }

    let shuttingDown = false;
    const shutdown = (signal: string): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down...`);
        pipeline.stop()
            .then(drained => process.exit(drained ? 0 : 1))
            .catch(error => {
                logger.error('Shutdown failed', { error: describeError(error) });
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    pipeline.start();
}

main().catch(error => {
    logger.error('Fatal error', { error: describeError(error), stack: error instanceof Error ? error.stack : undefined });
    process.exit(1);
});
