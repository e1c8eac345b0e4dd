import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  RssFeedWriter,
  buildRssFeed,
  escapeXml,
  formatRfc822,
  type FeedChannel,
} from '../../../src/export/RssFeedWriter';
import { ScrapeError } from '../../../src/errors/ScrapeError';
import { createLogger } from '../../../src/utils/logger';
import type { JobListing } from '../../../src/types/JobListing';

const channel: FeedChannel = {
  title: 'IFAD Jobs',
  link: 'https://careers.example.org/search?Page=HRS_APP_SCHJOB_FL&Action=U',
  description: 'Job listings from the careers portal',
  language: 'en-us',
};

const buildDate = new Date(Date.UTC(2026, 9, 19, 8, 0, 0));

const jobs: JobListing[] = [
  {
    title: 'Country Programme Officer',
    link: 'https://careers.example.org/job?JobOpeningId=1&Action=U',
    location: 'Rome, Italy',
    department: 'Programme Management Department',
    jobId: '1',
    description:
      'Country Programme Officer | Location: Rome, Italy | Department: Programme Management Department',
  },
  {
    title: 'Climate & "Resilience" <Lead>',
    link: 'https://careers.example.org/job?JobOpeningId=2',
    location: '',
    jobId: '2',
    description: 'Climate & "Resilience" <Lead>',
  },
];

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => name === 'item',
});

describe('escapeXml', () => {
  it('should escape the five XML special characters', () => {
    expect(escapeXml(`a & b < c > d " e ' f`)).toBe('a &amp; b &lt; c &gt; d &quot; e &apos; f');
  });

  it('should drop control characters XML cannot carry', () => {
    expect(escapeXml('Officer\u0000\u0007\u001F')).toBe('Officer');
  });

  it('should keep tabs and newlines', () => {
    expect(escapeXml('a\tb\nc')).toBe('a\tb\nc');
  });
});

describe('formatRfc822', () => {
  it('should format dates in UTC with a numeric zone', () => {
    expect(formatRfc822(buildDate)).toBe('Mon, 19 Oct 2026 08:00:00 +0000');
    expect(formatRfc822(new Date(Date.UTC(2026, 2, 5, 17, 4, 9)))).toBe(
      'Thu, 05 Mar 2026 17:04:09 +0000'
    );
  });
});

describe('buildRssFeed', () => {
  it('should produce well-formed XML', () => {
    expect(XMLValidator.validate(buildRssFeed(jobs, channel, buildDate))).toBe(true);
  });

  it('should include the channel metadata', () => {
    const parsed = xmlParser.parse(buildRssFeed(jobs, channel, buildDate));

    expect(parsed.rss['@_version']).toBe('2.0');
    expect(parsed.rss['@_xmlns:atom']).toBe('http://www.w3.org/2005/Atom');
    expect(parsed.rss.channel.title).toBe('IFAD Jobs');
    expect(parsed.rss.channel.link).toBe(channel.link);
    expect(parsed.rss.channel.description).toBe('Job listings from the careers portal');
    expect(parsed.rss.channel.language).toBe('en-us');
    expect(parsed.rss.channel.lastBuildDate).toBe('Mon, 19 Oct 2026 08:00:00 +0000');
  });

  it('should emit one item per job with non-empty title and link', () => {
    const parsed = xmlParser.parse(buildRssFeed(jobs, channel, buildDate));
    const items = parsed.rss.channel.item;

    expect(items).toHaveLength(2);
    expect(items[0].title).toBe('Country Programme Officer');
    expect(items[0].link).toBe('https://careers.example.org/job?JobOpeningId=1&Action=U');
    expect(items[0].description).toBe(jobs[0].description);
    expect(items[0].guid['#text']).toBe(items[0].link);
    expect(items[0].guid['@_isPermaLink']).toBe('true');
    expect(items[1].title).toBe('Climate & "Resilience" <Lead>');
    expect(items[1].link).toBe('https://careers.example.org/job?JobOpeningId=2');
  });

  it('should escape item text', () => {
    const xml = buildRssFeed(jobs, channel, buildDate);

    expect(xml).toContain(
      '      <title>Climate &amp; &quot;Resilience&quot; &lt;Lead&gt;</title>'
    );
    expect(xml).toContain(
      '      <link>https://careers.example.org/job?JobOpeningId=1&amp;Action=U</link>'
    );
  });

  it('should produce a valid feed with an empty channel for zero jobs', () => {
    const xml = buildRssFeed([], channel, buildDate);

    expect(XMLValidator.validate(xml)).toBe(true);
    expect(xml).not.toContain('<item>');
    expect(xml).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">',
        '  <channel>',
        '    <title>IFAD Jobs</title>',
        '    <link>https://careers.example.org/search?Page=HRS_APP_SCHJOB_FL&amp;Action=U</link>',
        '    <description>Job listings from the careers portal</description>',
        '    <language>en-us</language>',
        '    <lastBuildDate>Mon, 19 Oct 2026 08:00:00 +0000</lastBuildDate>',
        '  </channel>',
        '</rss>',
        '',
      ].join('\n')
    );
  });

  it('should add an atom self link when configured', () => {
    const xml = buildRssFeed([], { ...channel, selfUrl: 'https://feeds.example.org/jobs.xml' }, buildDate);

    expect(xml).toContain(
      '    <atom:link href="https://feeds.example.org/jobs.xml" rel="self" type="application/rss+xml"/>'
    );
    expect(XMLValidator.validate(xml)).toBe(true);
  });
});

describe('RssFeedWriter', () => {
  const logger = createLogger('test', { silent: true });
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rss-writer-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the feed as UTF-8 and return its path', async () => {
    const outputFile = path.join(tempDir, 'ifad_jobs.xml');
    const writer = new RssFeedWriter(outputFile, channel, logger);

    const written = await writer.write(jobs, buildDate);

    expect(written).toBe(outputFile);
    expect(fs.readFileSync(outputFile, 'utf-8')).toBe(buildRssFeed(jobs, channel, buildDate));
  });

  it('should create missing parent directories', async () => {
    const outputFile = path.join(tempDir, 'public', 'feeds', 'jobs.xml');
    const writer = new RssFeedWriter(outputFile, channel, logger);

    await writer.write([], buildDate);

    expect(fs.existsSync(outputFile)).toBe(true);
  });

  it('should replace an existing feed file', async () => {
    const outputFile = path.join(tempDir, 'jobs.xml');
    fs.writeFileSync(outputFile, 'stale', 'utf-8');
    const writer = new RssFeedWriter(outputFile, channel, logger);

    await writer.write([], buildDate);

    expect(fs.readFileSync(outputFile, 'utf-8')).toContain('<rss version="2.0"');
  });

  it('should throw a write-stage ScrapeError when the path is not writable', async () => {
    const blocker = path.join(tempDir, 'not-a-dir');
    fs.writeFileSync(blocker, '', 'utf-8');
    const writer = new RssFeedWriter(path.join(blocker, 'jobs.xml'), channel, logger);

    const error = await writer.write([], buildDate).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScrapeError);
    expect(error).toMatchObject({ stage: 'write' });
  });
});
