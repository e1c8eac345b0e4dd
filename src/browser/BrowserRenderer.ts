import * as fs from 'fs';
import * as path from 'path';
import { chromium, type Browser, type Page } from 'playwright';
import { ScrapeError } from '../errors/ScrapeError';
import type { Logger } from '../utils/logger';

/**
 * Anything that can turn a URL into rendered HTML
 */
export interface PageRenderer {
  render(url: string): Promise<string>;
}

/**
 * Configuration for the headless browser renderer
 */
export interface BrowserRendererConfig {
  headless: boolean;
  userAgent: string;
  navigationTimeoutMs: number;
  renderWaitMs: number;
  scrollPauseMs: number;
  readySelector?: string;
  debugHtmlPath?: string;
}

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'];

/**
 * Renders JavaScript-driven pages with headless Chromium.
 * Each render owns one browser session, closed before render() settles.
 */
export class BrowserRenderer implements PageRenderer {
  private readonly logger: Logger;
  private readonly config: BrowserRendererConfig;

  /**
   * Creates a new BrowserRenderer instance
   * @param logger - Logger instance
   * @param config - Browser and timing settings
   */
  constructor(logger: Logger, config: BrowserRendererConfig) {
    this.logger = logger;
    this.config = config;
  }

  /**
   * Loads a page, lets it settle and returns the rendered HTML
   * @param url - Page to render
   * @returns Rendered document HTML
   * @throws ScrapeError with stage "render" on launch, navigation or readiness failure
   */
  async render(url: string): Promise<string> {
    const browser = await this.launchBrowser();

    try {
      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: { width: 1920, height: 1080 },
      });
      const page = await context.newPage();

      this.logger.info('Loading page', { url });
      await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.config.navigationTimeoutMs,
      });

      await this.waitForContent(page);
      const html = await page.content();

      this.logger.info('Page rendered', { url, htmlLength: html.length });

      if (this.config.debugHtmlPath) {
        this.saveDebugHtml(this.config.debugHtmlPath, html);
      }

      return html;
    } catch (error) {
      throw ScrapeError.wrap('render', `Failed to render ${url}`, error);
    } finally {
      await this.closeBrowser(browser);
    }
  }

  private async launchBrowser(): Promise<Browser> {
    try {
      const browser = await chromium.launch({
        headless: this.config.headless,
        args: LAUNCH_ARGS,
      });
      this.logger.debug('Browser launched', { headless: this.config.headless });
      return browser;
    } catch (error) {
      throw new ScrapeError('render', 'Failed to launch headless browser', error);
    }
  }

  /**
   * Waits for dynamic content, then scrolls to trigger lazy loading
   */
  private async waitForContent(page: Page): Promise<void> {
    if (this.config.readySelector) {
      this.logger.debug('Waiting for ready selector', { selector: this.config.readySelector });
      try {
        await page.waitForSelector(this.config.readySelector, {
          timeout: this.config.navigationTimeoutMs,
        });
      } catch (error) {
        throw new ScrapeError(
          'render',
          `Expected markup "${this.config.readySelector}" did not appear`,
          error
        );
      }
    }

    this.logger.info('Waiting for JavaScript to render', { waitMs: this.config.renderWaitMs });
    await page.waitForTimeout(this.config.renderWaitMs);

    await page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
    await page.waitForTimeout(this.config.scrollPauseMs);
    await page.evaluate('window.scrollTo(0, 0)');
    await page.waitForTimeout(Math.floor(this.config.scrollPauseMs / 2));
  }

  private saveDebugHtml(filePath: string, html: string): void {
    try {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      fs.writeFileSync(filePath, html, 'utf-8');
      this.logger.info('Saved rendered HTML', { filePath });
    } catch (error) {
      this.logger.warn('Failed to save rendered HTML', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async closeBrowser(browser: Browser): Promise<void> {
    try {
      await browser.close();
      this.logger.debug('Browser closed');
    } catch (error) {
      // never mask the render outcome
      this.logger.warn('Failed to close browser', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
