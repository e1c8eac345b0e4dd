import type { BaseScraper } from '../scrapers/base/BaseScraper';
import type { RssFeedWriter } from '../export/RssFeedWriter';
import type { Logger } from '../utils/logger';

/**
 * Outcome of one feed build
 */
export interface FeedBuildResult {
  outputPath: string;
  jobCount: number;
}

/**
 * Runs the pipeline once: render and parse the careers page, then write the feed.
 * An empty result still produces a feed with no items.
 */
export class FeedBuilder {
  private readonly scraper: BaseScraper;
  private readonly writer: RssFeedWriter;
  private readonly logger: Logger;

  constructor(scraper: BaseScraper, writer: RssFeedWriter, logger: Logger) {
    this.scraper = scraper;
    this.writer = writer;
    this.logger = logger;
  }

  async build(): Promise<FeedBuildResult> {
    const result = await this.scraper.scrape();

    if (result.jobs.length === 0) {
      this.logger.warn('No jobs found, writing empty feed', { sourceUrl: result.sourceUrl });
    }

    const outputPath = await this.writer.write(result.jobs, result.scrapedAt);

    return { outputPath, jobCount: result.jobs.length };
  }
}
