import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { BaseParser } from '../base/BaseParser';
import type { Logger } from '../../utils/logger';
import { JobListingSchema, describeJob, type JobListing } from '../../types/JobListing';

const JOB_OPENING_ID_SELECTOR = 'span[id*="HRS_APP_JBSCH_I_HRS_JOB_OPENING_ID$"]';
const JOB_TITLE_LINK_SELECTOR = 'a[id*="SCH_JOB_TITLE$"]';

const MIN_TITLE_LENGTH = 5;

// Navigation links that share the title-link id pattern on some portal skins
const SKIP_KEYWORDS = /\b(?:search|filter|login|sign in|home|about|all jobs)\b/i;

/**
 * Options for the IFAD parser
 */
export interface IfadParserOptions {
  /** Job posting URL with a {jobId} placeholder */
  jobDetailUrlTemplate: string;
  /** Maximum number of candidate rows processed per page */
  maxJobs: number;
}

/**
 * Parser for the IFAD PeopleSoft candidate gateway search results.
 *
 * Rows are found by job opening id first; if the page exposes none, the
 * job title links are used instead.
 */
export class IfadParser extends BaseParser {
  private readonly options: IfadParserOptions;

  /**
   * Creates a new IfadParser instance
   * @param logger - Logger instance
   * @param baseUrl - Careers search page URL
   * @param options - Detail URL template and row limit
   */
  constructor(logger: Logger, baseUrl: string, options: IfadParserOptions) {
    super(logger, baseUrl);
    this.options = options;
  }

  parseJobListings(html: string, pageUrl: string): JobListing[] {
    const $ = cheerio.load(html);

    const idElements = $(JOB_OPENING_ID_SELECTOR).toArray();
    if (idElements.length > 0) {
      this.logger.info('Found job rows by opening id', { count: idElements.length });
      return this.collect(idElements, (element, position) =>
        this.parseByOpeningId($, element, position)
      );
    }

    const linkElements = $(JOB_TITLE_LINK_SELECTOR).toArray();
    if (linkElements.length > 0) {
      this.logger.info('Found job rows by title link', { count: linkElements.length });
      return this.collect(linkElements, (element) =>
        this.parseByTitleLink($, element, pageUrl)
      );
    }

    this.logger.warn('No job rows found on page', {
      pageUrl,
      htmlLength: html.length,
      totalLinks: $('a').length,
    });
    return [];
  }

  /**
   * Runs a row parser over at most maxJobs elements, skipping rows that fail
   */
  private collect(
    elements: Element[],
    parseRow: (element: Element, position: number) => JobListing | null
  ): JobListing[] {
    const jobs: JobListing[] = [];
    const candidates = elements.slice(0, this.options.maxJobs);

    if (elements.length > candidates.length) {
      this.logger.info('Limiting rows processed', {
        found: elements.length,
        maxJobs: this.options.maxJobs,
      });
    }

    candidates.forEach((element, position) => {
      try {
        const job = parseRow(element, position);
        if (job) {
          jobs.push(job);
          this.logger.debug('Parsed job', { title: job.title, link: job.link });
        }
      } catch (error) {
        this.logger.warn('Error processing job row', {
          position,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    this.logger.info('Parsed job listings', { count: jobs.length });
    return jobs;
  }

  private parseByOpeningId(
    $: cheerio.CheerioAPI,
    element: Element,
    position: number
  ): JobListing | null {
    const jobId = this.cleanText($(element).text());
    if (!jobId) {
      return null;
    }

    const rowIndex = this.rowIndexOf($(element).attr('id')) ?? String(position);
    const title = this.textById($, 'SCH_JOB_TITLE', rowIndex);
    if (!title) {
      this.logger.debug('Skipping row without title', { jobId, rowIndex });
      return null;
    }

    return this.validate({
      title,
      link: this.options.jobDetailUrlTemplate.replace('{jobId}', encodeURIComponent(jobId)),
      location: this.textById($, 'LOCATION', rowIndex),
      department: this.textById($, 'HRS_APP_JBSCH_I_HRS_DEPT_DESCR', rowIndex) || undefined,
      jobId,
    });
  }

  private parseByTitleLink(
    $: cheerio.CheerioAPI,
    element: Element,
    pageUrl: string
  ): JobListing | null {
    const $link = $(element);
    const link = this.resolveLink($link.attr('href'), pageUrl);
    if (!link) {
      return null;
    }

    const title = this.cleanText($link.text());
    if (title.length < MIN_TITLE_LENGTH) {
      return null;
    }
    if (SKIP_KEYWORDS.test(title)) {
      this.logger.debug('Skipping navigation link', { title });
      return null;
    }

    const $row = $link.closest('tr');
    const location = this.cleanText($row.find('[id*="LOCATION"]').first().text());
    const department = this.cleanText(
      $row.find('[id*="DEPT_DESCR"], [id*="DEPARTMENT"]').first().text()
    );

    return this.validate({
      title,
      link,
      location,
      department: department || undefined,
    });
  }

  private validate(fields: Omit<JobListing, 'description'>): JobListing | null {
    const result = JobListingSchema.safeParse({ ...fields, description: describeJob(fields) });
    if (!result.success) {
      this.logger.warn('Discarding invalid job listing', {
        title: fields.title,
        issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
      return null;
    }
    return result.data;
  }

  /**
   * Text of the element whose id is exactly `${prefix}$${rowIndex}`
   */
  private textById($: cheerio.CheerioAPI, prefix: string, rowIndex: string): string {
    return this.cleanText($(`[id="${prefix}$${rowIndex}"]`).first().text());
  }

  private rowIndexOf(id: string | undefined): string | undefined {
    const match = id?.match(/\$(\d+)$/);
    return match ? match[1] : undefined;
  }
}
