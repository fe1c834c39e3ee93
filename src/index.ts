#!/usr/bin/env node
import path from 'path';
import { loadConfig, ConfigError } from './config.js';
import type { AppConfig } from './config.js';
import { createLogger } from './core/logger.js';
import { PageFetcher } from './core/fetcher.js';
import { runScrape } from './scrapers/run.js';

async function main(config: AppConfig) {
  const logger = createLogger({ level: config.logLevel, logDir: config.paths.logs });

  logger.info('='.repeat(50));
  logger.info('EV Charger Mention Scraper');
  logger.info('='.repeat(50));

  const fetcher = new PageFetcher({
    timeoutMs: config.http.timeoutMs,
    maxRetries: config.http.maxRetries,
    retryDelayMs: config.http.retryDelayMs,
    logger,
  });

  try {
    const summary = await runScrape({
      urlFile: path.resolve(config.urlFile),
      outputFile: path.resolve(config.outputFile),
      requestDelayMs: config.requestDelayMs,
      fetcher,
      logger,
    });
    logger.info(`Run finished: ${summary.urls} URLs, ${summary.records.length} records`);
  } catch (error) {
    logger.error('Scrape failed:', error);
    process.exitCode = 1;
  }
}

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid Configuration:', JSON.stringify(error.issues, null, 2));
      process.exit(1);
    }
    throw error;
  }
}

main(readConfig()).catch(error => {
  console.error('Failed to start:', error);
  process.exit(1);
});
