import type { ZodIssue } from 'zod';
import { FeedConfigSchema, type FeedConfig } from '../types/FeedConfig';

function parseIntOrUndefined(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

const BOOLEAN_VALUES: Record<string, boolean> = {
  true: true,
  '1': true,
  yes: true,
  false: false,
  '0': false,
  no: false,
};

// Unknown values are passed through so the schema rejects them
function parseBooleanOrRaw(value: string | undefined): boolean | string | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }
  const parsed = BOOLEAN_VALUES[value.trim().toLowerCase()];
  return parsed ?? value;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Loads and validates feed configuration from environment variables
 * @param env - Environment to read, process.env by default
 * @returns Validated configuration
 * @throws Error if configuration is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FeedConfig {
  const config = {
    careersUrl: emptyToUndefined(env.CAREERS_URL),
    jobDetailUrlTemplate: emptyToUndefined(env.JOB_DETAIL_URL_TEMPLATE),
    outputFile: emptyToUndefined(env.OUTPUT_FILE),
    feedTitle: emptyToUndefined(env.FEED_TITLE),
    feedDescription: emptyToUndefined(env.FEED_DESCRIPTION),
    feedSelfUrl: emptyToUndefined(env.FEED_SELF_URL),
    feedLanguage: emptyToUndefined(env.FEED_LANGUAGE),
    headless: parseBooleanOrRaw(env.HEADLESS),
    userAgent: emptyToUndefined(env.USER_AGENT),
    navigationTimeoutMs: parseIntOrUndefined(env.NAVIGATION_TIMEOUT_MS),
    renderWaitMs: parseIntOrUndefined(env.RENDER_WAIT_MS),
    scrollPauseMs: parseIntOrUndefined(env.SCROLL_PAUSE_MS),
    readySelector: emptyToUndefined(env.READY_SELECTOR),
    maxJobs: parseIntOrUndefined(env.MAX_JOBS),
    debugHtmlPath: emptyToUndefined(env.DEBUG_HTML_PATH),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    logDir: emptyToUndefined(env.LOG_DIR),
  };

  const result = FeedConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map((e: ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  return result.data;
}
