#!/usr/bin/env node
/**
 * Scrape every review page of one product and save the reviews as CSV.
 *
 * Usage: npm run scrape -- --url <review page URL> [--output reviews.csv] [--headless]
 */
import "dotenv/config";
import { ReviewScraper } from "../services/review-scraper.js";
import { CsvResultSink } from "../services/csv-result-sink.js";
import { launchPlaywrightSession } from "../services/playwright-browser-session.js";
import { ScrapeInterruptedError } from "../services/scrape-errors.js";
import { createConsoleLogger } from "../utils/scrape-logger.js";
import {
  SCRAPE_USAGE,
  ScrapeConfigError,
  resolveScrapeConfig,
  wantsHelp
} from "./scrape-config.js";

const main = async () => {
  const argv = process.argv.slice(2);
  if (wantsHelp(argv)) {
    console.log(SCRAPE_USAGE);
    return;
  }

  const config = resolveScrapeConfig(argv, process.env);
  const logger = createConsoleLogger({ verbose: config.verbose });

  const abortController = new AbortController();
  const interrupt = () => abortController.abort();
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  const scraper = new ReviewScraper({
    sessionFactory: () =>
      launchPlaywrightSession({
        headless: config.headless,
        executablePath: config.chromePath,
        blockResources: config.blockResources,
        logger
      }),
    sink: new CsvResultSink(),
    logger
  });

  const startTime = Date.now();
  try {
    const summary = await scraper.run(config.url, config.output, {
      signal: abortController.signal
    });
    const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.debug(`Scraped ${summary.pageCount} page(s) in ${elapsedSeconds}s`);
  } catch (error) {
    if (error instanceof ScrapeInterruptedError) {
      logger.warn("Process interrupted by user");
      process.exit(1);
    }
    throw error;
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
  }
};

main().catch((error) => {
  if (error instanceof ScrapeConfigError) {
    console.error(error.message);
    console.error(`\n${SCRAPE_USAGE}`);
  } else {
    console.error("Fatal error in scrape-reviews:");
    console.error(error);
  }
  process.exit(1);
});
