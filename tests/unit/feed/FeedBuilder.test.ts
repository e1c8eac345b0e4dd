import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FeedBuilder } from '../../../src/feed/FeedBuilder';
import { IfadScraper } from '../../../src/scrapers/ifad/IfadScraper';
import { IfadParser } from '../../../src/scrapers/ifad/IfadParser';
import { RssFeedWriter } from '../../../src/export/RssFeedWriter';
import { ScrapeError } from '../../../src/errors/ScrapeError';
import type { PageRenderer } from '../../../src/browser/BrowserRenderer';
import { createLogger } from '../../../src/utils/logger';
import { CAREERS_URL, DETAIL_TEMPLATE, loadHTMLFixture } from '../../fixtures/htmlFixtures';

function staticRenderer(html: string): PageRenderer {
  return { render: async () => html };
}

describe('FeedBuilder', () => {
  const logger = createLogger('test', { silent: true });
  const xmlParser = new XMLParser({ isArray: (name) => name === 'item' });
  let tempDir: string;
  let outputFile: string;
  let writer: RssFeedWriter;
  let parser: IfadParser;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'feed-builder-'));
    outputFile = path.join(tempDir, 'ifad_jobs.xml');
    writer = new RssFeedWriter(
      outputFile,
      {
        title: 'IFAD Jobs',
        link: CAREERS_URL,
        description: 'Job listings',
        language: 'en-us',
      },
      logger
    );
    parser = new IfadParser(logger, CAREERS_URL, {
      jobDetailUrlTemplate: DETAIL_TEMPLATE,
      maxJobs: 50,
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write one feed item per scraped job', async () => {
    const scraper = new IfadScraper(
      staticRenderer(loadHTMLFixture('opening-id-results.html')),
      parser,
      logger,
      CAREERS_URL
    );
    const builder = new FeedBuilder(scraper, writer, logger);

    const result = await builder.build();

    expect(result).toEqual({ outputPath: outputFile, jobCount: 3 });
    const xml = fs.readFileSync(outputFile, 'utf-8');
    expect(XMLValidator.validate(xml)).toBe(true);
    const items = xmlParser.parse(xml).rss.channel.item;
    expect(items.map((item: { title: string }) => item.title)).toEqual([
      'Country Programme Officer',
      'Senior Finance Specialist',
      'Climate & Environment Analyst',
    ]);
  });

  it('should write an empty-channel feed when no jobs are found', async () => {
    const scraper = new IfadScraper(
      staticRenderer(loadHTMLFixture('no-results.html')),
      parser,
      logger,
      CAREERS_URL
    );
    const builder = new FeedBuilder(scraper, writer, logger);

    const result = await builder.build();

    expect(result.jobCount).toBe(0);
    const xml = fs.readFileSync(outputFile, 'utf-8');
    expect(XMLValidator.validate(xml)).toBe(true);
    expect(xmlParser.parse(xml).rss.channel.title).toBe('IFAD Jobs');
    expect(xml).not.toContain('<item>');
  });

  it('should not write a feed when scraping fails', async () => {
    const failing: PageRenderer = {
      render: async () => {
        throw new ScrapeError('render', 'Failed to launch headless browser');
      },
    };
    const builder = new FeedBuilder(
      new IfadScraper(failing, parser, logger, CAREERS_URL),
      writer,
      logger
    );

    await expect(builder.build()).rejects.toBeInstanceOf(ScrapeError);
    expect(fs.existsSync(outputFile)).toBe(false);
  });
});
