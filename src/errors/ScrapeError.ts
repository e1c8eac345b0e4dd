/**
 * Pipeline stage a failure happened in
 */
export type ScrapeStage = 'render' | 'parse' | 'write';

/**
 * Raised when a feed build fails. Any ScrapeError aborts the run with a non-zero exit.
 */
export class ScrapeError extends Error {
  readonly stage: ScrapeStage;

  constructor(stage: ScrapeStage, message: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${message}${detail}`, { cause });
    this.name = 'ScrapeError';
    this.stage = stage;
  }

  /**
   * Wraps an unknown error, keeping an existing ScrapeError as is
   */
  static wrap(stage: ScrapeStage, message: string, error: unknown): ScrapeError {
    if (error instanceof ScrapeError) {
      return error;
    }
    return new ScrapeError(stage, message, error);
  }
}
