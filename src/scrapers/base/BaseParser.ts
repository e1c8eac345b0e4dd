import type { Logger } from '../../utils/logger';
import type { JobListing } from '../../types/JobListing';

/**
 * Abstract base class for parsing job listings from rendered HTML
 * Each site-specific parser should extend this class
 */
export abstract class BaseParser {
  protected readonly logger: Logger;
  protected readonly baseUrl: string;

  /**
   * Creates a new BaseParser instance
   * @param logger - Logger instance
   * @param baseUrl - Base URL of the website
   */
  constructor(logger: Logger, baseUrl: string) {
    this.logger = logger;
    this.baseUrl = baseUrl;
  }

  /**
   * Parses job listings from HTML content. Returns an empty array for pages without listings.
   * @param html - Rendered HTML to parse
   * @param pageUrl - URL the HTML was rendered from, used to resolve relative links
   */
  abstract parseJobListings(html: string, pageUrl: string): JobListing[];

  /**
   * Collapses runs of whitespace and trims
   */
  protected cleanText(text: string | undefined): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
  }

  /**
   * Resolves an href against the page URL; null unless the result is http(s)
   */
  protected resolveLink(href: string | undefined, pageUrl: string): string | null {
    if (!href) {
      return null;
    }
    try {
      const resolved = new URL(href.trim(), pageUrl || this.baseUrl);
      return resolved.protocol === 'http:' || resolved.protocol === 'https:'
        ? resolved.toString()
        : null;
    } catch {
      return null;
    }
  }
}
