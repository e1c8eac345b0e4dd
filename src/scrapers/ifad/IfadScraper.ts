import { BaseScraper } from '../base/BaseScraper';
import type { PageRenderer } from '../../browser/BrowserRenderer';
import type { IfadParser } from './IfadParser';
import type { Logger } from '../../utils/logger';

/**
 * Scraper for the IFAD careers portal
 */
export class IfadScraper extends BaseScraper {
  private readonly careersUrl: string;

  /**
   * Creates a new IfadScraper instance
   * @param renderer - Headless browser renderer
   * @param parser - IFAD results parser
   * @param logger - Logger instance
   * @param careersUrl - Job search page of the portal
   */
  constructor(renderer: PageRenderer, parser: IfadParser, logger: Logger, careersUrl: string) {
    super(renderer, parser, logger);
    this.careersUrl = careersUrl;
  }

  protected getStartingUrl(): string {
    return this.careersUrl;
  }
}
