/**
 * Run a single scrape of every location, report, and exit.
 * Usage: npm run scrape-once
 */

import { ConfigError, EXIT_CONFIG_ERROR, loadConfig } from './config.js';
import { describeError } from './ingestion/errors.js';
import { logger } from './logger.js';
import { IngestionPipeline } from './pipeline.js';
import { loadLocations } from './weather/locations.js';

async function scrapeOnce(): Promise<number> {
    const config = loadConfig();
    const locations = loadLocations(config.locationsFile);
    const pipeline = new IngestionPipeline(config, locations);

    try {
        const result = await pipeline.runOnce();

        for (const reading of result.succeeded) {
            logger.info(`Saved ${reading.locationId}: ${reading.temperature} (${reading.units}), ${reading.conditionDescription}`);
        }
        for (const { location, error } of result.failed) {
            logger.warn(`Failed to fetch ${location.id}: [${error.kind}] ${error.message}`);
        }
        for (const location of result.deferred) {
            logger.warn(`Deferred ${location.id}: not enough quota`);
        }

        const recent = pipeline.store.recentReadings(1);
        logger.info(`Collected ${recent.length} readings observed in the last hour`);

        return result.failed.length === 0 ? 0 : 1;
    } finally {
        pipeline.store.close();
    }
}

scrapeOnce()
    .then(code => process.exit(code))
    .catch(error => {
        if (error instanceof ConfigError) {
            logger.error(`Configuration error: ${error.message}`);
            process.exit(EXIT_CONFIG_ERROR);
        }
        logger.error('Scrape failed', { error: describeError(error) });
        process.exit(1);
    });
