export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** A wait the run cannot continue without (review list, page button) ran out of time. */
export class MandatoryWaitTimeoutError extends Error {
  readonly selector: string;
  readonly timeoutMs: number;

  constructor(selector: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${selector}`);
    this.name = "MandatoryWaitTimeoutError";
    this.selector = selector;
    this.timeoutMs = timeoutMs;
  }
}

export class ScrapeInterruptedError extends Error {
  constructor(message = "Scrape interrupted before completion") {
    super(message);
    this.name = "ScrapeInterruptedError";
  }
}
