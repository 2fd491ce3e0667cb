#!/usr/bin/env node

import chalk from 'chalk';
import ora from 'ora';
import { buildConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { createLogger } from './logger.js';
import { ScrapeExhaustedError, syncPrices } from './priceSync.js';
import { renderAttempts, renderRecords } from './report.js';
import { openBrowserSession } from './scrapers/mmtcpamp/browser.js';
import { scrapeWithEscalation } from './scrapers/mmtcpamp/ladder.js';
import { formatRunDate } from './scrapers/mmtcpamp/records.js';
import { createPriceStore } from './storeFactory.js';

async function run(): Promise<void> {
  await loadDotEnv();
  const config = buildConfig();
  const logger = createLogger({ verbose: config.verbose });
  const store = createPriceStore(config.store);
  const date = formatRunDate(new Date(), config.runTimeZone);

  logger.info(chalk.bold(`Scraping ${config.scraper.url} for ${date}`));

  const result = await syncPrices({
    scrape: () => scrapeWithEscalation(config.scraper, openBrowserSession, { logger, date }),
    store,
    logger,
    dryRun: config.dryRun,
    onWrite: async (write, rowCount) => {
      const spinner = ora({ text: `Writing ${rowCount} rows to ${store.describe()}...`, color: 'cyan' }).start();
      try {
        await write();
        spinner.succeed(chalk.green(`Saved ${rowCount} rows to ${store.describe()}`));
      } catch (error) {
        spinner.fail(chalk.red('Write failed'));
        throw error;
      }
    }
  });

  console.log(renderAttempts(result.outcome.attempts));
  console.log(renderRecords(result.outcome.records));
  if (result.summary) {
    const { added, updated, unchanged } = result.summary;
    logger.info(
      `${chalk.green(`${added} added`)}, ${chalk.yellow(`${updated} updated`)}, ${chalk.gray(`${unchanged} unchanged`)}`
    );
  }
}

run().catch(error => {
  if (error instanceof ScrapeExhaustedError) {
    console.error(renderAttempts(error.outcome.attempts));
  }
  console.error(chalk.red('Gold price scrape failed:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
