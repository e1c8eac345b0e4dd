import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../utils/logger';
import type { JobListing } from '../types/JobListing';
import { ScrapeError } from '../errors/ScrapeError';

const ATOM_NAMESPACE = 'http://www.w3.org/2005/Atom';

/**
 * Channel-level metadata of the feed
 */
export interface FeedChannel {
  title: string;
  link: string;
  description: string;
  language: string;
  /** Public URL of the feed file itself, emitted as atom:link rel="self" */
  selfUrl?: string;
}

// Characters outside the XML 1.0 Char production
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/**
 * Escapes XML special characters and drops characters XML 1.0 cannot carry
 */
export function escapeXml(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Formats a date as RFC 822 in UTC, e.g. "Mon, 19 Oct 2026 08:00:00 +0000"
 */
export function formatRfc822(date: Date): string {
  return date.toUTCString().replace(/GMT$/, '+0000');
}

/**
 * Renders an RSS 2.0 document with one item per job, in input order
 */
export function buildRssFeed(jobs: JobListing[], channel: FeedChannel, buildDate: Date): string {
  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<rss version="2.0" xmlns:atom="${ATOM_NAMESPACE}">`,
    '  <channel>',
    `    <title>${escapeXml(channel.title)}</title>`,
    `    <link>${escapeXml(channel.link)}</link>`,
    `    <description>${escapeXml(channel.description)}</description>`,
    `    <language>${escapeXml(channel.language)}</language>`,
  ];

  if (channel.selfUrl) {
    lines.push(
      `    <atom:link href="${escapeXml(channel.selfUrl)}" rel="self" type="application/rss+xml"/>`
    );
  }

  lines.push(`    <lastBuildDate>${formatRfc822(buildDate)}</lastBuildDate>`);

  for (const job of jobs) {
    lines.push(
      '    <item>',
      `      <title>${escapeXml(job.title)}</title>`,
      `      <link>${escapeXml(job.link)}</link>`,
      `      <description>${escapeXml(job.description)}</description>`,
      `      <guid isPermaLink="true">${escapeXml(job.link)}</guid>`,
      '    </item>'
    );
  }

  lines.push('  </channel>', '</rss>');
  return `${lines.join('\n')}\n`;
}

/**
 * Writes job listings to the RSS feed file
 */
export class RssFeedWriter {
  private readonly outputFile: string;
  private readonly channel: FeedChannel;
  private readonly logger: Logger;

  /**
   * Creates a new RssFeedWriter instance
   * @param outputFile - Path of the feed file, replaced on every write
   * @param channel - Channel metadata
   * @param logger - Logger instance
   */
  constructor(outputFile: string, channel: FeedChannel, logger: Logger) {
    this.outputFile = outputFile;
    this.channel = channel;
    this.logger = logger;
  }

  /**
   * Builds the feed and writes it as UTF-8
   * @returns Path of the written file
   * @throws ScrapeError with stage "write" if the file cannot be written
   */
  async write(jobs: JobListing[], buildDate: Date = new Date()): Promise<string> {
    const xml = buildRssFeed(jobs, this.channel, buildDate);

    try {
      const dir = path.dirname(path.resolve(this.outputFile));
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(this.outputFile, xml, 'utf-8');
    } catch (error) {
      this.logger.error('Failed to write RSS feed', {
        outputFile: this.outputFile,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ScrapeError('write', `Failed to write feed to ${this.outputFile}`, error);
    }

    this.logger.info('RSS feed generated', {
      outputFile: this.outputFile,
      jobCount: jobs.length,
    });

    return this.outputFile;
  }
}
