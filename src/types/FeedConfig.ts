import { z } from 'zod';

export const DEFAULT_CAREERS_URL =
  'https://job.ifad.org/psc/IFHRPRDE/CAREERS/JOBS/c/HRS_HRAM_FL.HRS_CG_SEARCH_FL.GBL?Page=HRS_APP_SCHJOB_FL&Action=U';

export const DEFAULT_JOB_DETAIL_URL_TEMPLATE =
  'https://job.ifad.org/psc/IFHRPRDE/CAREERS/JOBS/c/HRS_HRAM_FL.HRS_CG_SEARCH_FL.GBL?Page=HRS_APP_JBPST&Action=U&FOCUS=Applicant&SiteId=1&JobOpeningId={jobId}';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Schema for feed builder configuration
 */
export const FeedConfigSchema = z.object({
  careersUrl: z.string().url().default(DEFAULT_CAREERS_URL),
  jobDetailUrlTemplate: z
    .string()
    .url()
    .includes('{jobId}', { message: 'Template must contain {jobId}' })
    .default(DEFAULT_JOB_DETAIL_URL_TEMPLATE),
  outputFile: z.string().min(1).default('ifad_jobs.xml'),
  feedTitle: z.string().min(1).default('IFAD Jobs'),
  feedDescription: z
    .string()
    .min(1)
    .default('Job listings from International Fund for Agricultural Development (IFAD)'),
  feedSelfUrl: z.string().url().optional(),
  feedLanguage: z.string().min(1).default('en-us'),
  headless: z.boolean().default(true),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  navigationTimeoutMs: z.number().int().positive().default(60000),
  renderWaitMs: z.number().int().nonnegative().default(20000), // PeopleSoft is slow to render
  scrollPauseMs: z.number().int().nonnegative().default(3000),
  readySelector: z.string().min(1).optional(),
  maxJobs: z.number().int().positive().default(50),
  debugHtmlPath: z.string().min(1).optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logDir: z.string().min(1).optional(),
});

/**
 * TypeScript type for feed builder configuration
 */
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
