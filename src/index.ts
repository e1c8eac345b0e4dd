#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { loadConfig } from './utils/validators';
import { createLogger, type Logger } from './utils/logger';
import { BrowserRenderer } from './browser/BrowserRenderer';
import { IfadParser } from './scrapers/ifad/IfadParser';
import { IfadScraper } from './scrapers/ifad/IfadScraper';
import { RssFeedWriter } from './export/RssFeedWriter';
import { FeedBuilder } from './feed/FeedBuilder';
import { ScrapeError } from './errors/ScrapeError';
import type { FeedConfig } from './types/FeedConfig';

/**
 * Wires the pipeline components from configuration
 */
export function createFeedBuilder(config: FeedConfig, logger: Logger): FeedBuilder {
  const renderer = new BrowserRenderer(logger, {
    headless: config.headless,
    userAgent: config.userAgent,
    navigationTimeoutMs: config.navigationTimeoutMs,
    renderWaitMs: config.renderWaitMs,
    scrollPauseMs: config.scrollPauseMs,
    readySelector: config.readySelector,
    debugHtmlPath: config.debugHtmlPath,
  });
  const parser = new IfadParser(logger, config.careersUrl, {
    jobDetailUrlTemplate: config.jobDetailUrlTemplate,
    maxJobs: config.maxJobs,
  });
  const scraper = new IfadScraper(renderer, parser, logger, config.careersUrl);
  const writer = new RssFeedWriter(
    config.outputFile,
    {
      title: config.feedTitle,
      link: config.careersUrl,
      description: config.feedDescription,
      language: config.feedLanguage,
      selfUrl: config.feedSelfUrl,
    },
    logger
  );

  return new FeedBuilder(scraper, writer, logger);
}

/**
 * Main entry point: builds the feed once
 * @returns Process exit code, 0 on success
 */
async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  dotenv.config();

  let config: FeedConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const logger = createLogger('ifad-jobs-feed', {
    level: config.logLevel,
    logDir: config.logDir,
  });

  logger.info('IFAD jobs feed starting', {
    careersUrl: config.careersUrl,
    outputFile: config.outputFile,
  });

  try {
    const result = await createFeedBuilder(config, logger).build();
    logger.info('Feed build completed', {
      outputPath: result.outputPath,
      jobCount: result.jobCount,
    });
    return 0;
  } catch (error) {
    logger.error('Feed build failed', {
      error: error instanceof Error ? error.message : String(error),
      stage: error instanceof ScrapeError ? error.stage : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }
}

/**
 * Runs main() and records its exit code. The process exits once the
 * log transports have flushed, so nothing written last is lost.
 */
async function run(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  try {
    process.exitCode = await main(env);
  } catch (error) {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
}

// Run if executed directly
if (require.main === module) {
  void run();
}

export { main, run };
