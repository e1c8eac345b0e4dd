import type { PageRenderer } from '../../browser/BrowserRenderer';
import type { BaseParser } from './BaseParser';
import type { Logger } from '../../utils/logger';
import type { JobListing } from '../../types/JobListing';
import { ScrapeError } from '../../errors/ScrapeError';

/**
 * Scraping result
 */
export interface ScrapingResult {
  jobs: JobListing[];
  totalJobsFound: number;
  sourceUrl: string;
  scrapedAt: Date;
}

/**
 * Abstract base class for scrapers
 * Each site-specific scraper should extend this class
 */
export abstract class BaseScraper {
  protected readonly renderer: PageRenderer;
  protected readonly parser: BaseParser;
  protected readonly logger: Logger;

  /**
   * Creates a new BaseScraper instance
   * @param renderer - Renderer producing the page HTML
   * @param parser - Parser for extracting job data from HTML
   * @param logger - Logger instance
   */
  constructor(renderer: PageRenderer, parser: BaseParser, logger: Logger) {
    this.renderer = renderer;
    this.parser = parser;
    this.logger = logger;
  }

  /**
   * Gets the starting URL for scraping
   * Must be implemented by site-specific scrapers
   */
  protected abstract getStartingUrl(): string;

  /**
   * Renders the starting page and extracts its job listings
   * @throws ScrapeError when rendering or parsing fails
   */
  async scrape(): Promise<ScrapingResult> {
    const sourceUrl = this.getStartingUrl();
    this.logger.info('Starting scraping', { sourceUrl });

    const html = await this.renderer.render(sourceUrl);

    let jobs: JobListing[];
    try {
      jobs = this.parser.parseJobListings(html, sourceUrl);
    } catch (error) {
      throw ScrapeError.wrap('parse', 'Failed to parse job listings', error);
    }

    this.logger.info(`Found ${jobs.length} jobs`, { sourceUrl });

    return {
      jobs,
      totalJobsFound: jobs.length,
      sourceUrl,
      scrapedAt: new Date(),
    };
  }
}
