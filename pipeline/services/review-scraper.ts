import { setTimeout as delay } from "node:timers/promises";
import type { BrowserSession, BrowserSessionFactory } from "./browser-session.js";
import { CsvResultSink, type ResultSink } from "./csv-result-sink.js";
import { parseLastPageNumber, parseReviewsPage } from "./review-parser.js";
import { expandTruncatedReviews } from "./review-text-expander.js";
import {
  MandatoryWaitTimeoutError,
  ScrapeInterruptedError,
  errorMessage
} from "./scrape-errors.js";
import {
  DEFAULT_REVIEW_PAGE_SELECTORS,
  type ReviewPageSelectors
} from "../constants/review-page-selectors.js";
import { DEFAULT_SCRAPE_TIMING, type ScrapeTiming } from "../constants/scrape-timing.js";
import { silentLogger, type ScrapeLogger } from "../utils/scrape-logger.js";
import type {
  ReviewCollection,
  ReviewRecord,
  ScrapeRunSummary
} from "../types/domain.js";

export type AbortableSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

interface ReviewScraperOptions {
  timing: ScrapeTiming;
  selectors: ReviewPageSelectors;
}

interface ReviewScraperConstructorOptions extends Partial<ReviewScraperOptions> {
  sessionFactory: BrowserSessionFactory;
  sink?: ResultSink;
  logger?: ScrapeLogger;
  now?: () => Date;
  sleep?: AbortableSleep;
}

export interface ScrapeRunOptions {
  signal?: AbortSignal;
}

interface CollectedReviews {
  reviews: ReviewCollection;
  pageCount: number;
}

const DEFAULT_OPTIONS: ReviewScraperOptions = {
  timing: DEFAULT_SCRAPE_TIMING,
  selectors: DEFAULT_REVIEW_PAGE_SELECTORS
};

const abortableDelay: AbortableSleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class ReviewScraper {
  private readonly options: ReviewScraperOptions;
  private readonly sessionFactory: BrowserSessionFactory;
  private readonly sink: ResultSink;
  private readonly logger: ScrapeLogger;
  private readonly now: () => Date;
  private readonly sleep: AbortableSleep;

  constructor(options: ReviewScraperConstructorOptions) {
    this.options = {
      timing: options.timing ?? DEFAULT_OPTIONS.timing,
      selectors: options.selectors ?? DEFAULT_OPTIONS.selectors
    };
    this.sessionFactory = options.sessionFactory;
    this.sink = options.sink ?? new CsvResultSink();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? abortableDelay;
  }

  private throwIfInterrupted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new ScrapeInterruptedError();
    }
  }

  private async requireSelector(session: BrowserSession, selector: string): Promise<void> {
    const timeoutMs = this.options.timing.mandatoryWaitTimeoutMs;
    if (!(await session.waitFor(selector, timeoutMs))) {
      throw new MandatoryWaitTimeoutError(selector, timeoutMs);
    }
  }

  private async releaseSession(session: BrowserSession): Promise<void> {
    const timeoutMs = this.options.timing.sessionCloseTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const closing = session.close().then(
      () => "closed" as const,
      (closeError: unknown) => {
        this.logger.warn(`Failed to close browser: ${errorMessage(closeError)}`);
        return "failed" as const;
      }
    );
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    try {
      if ((await Promise.race([closing, timedOut])) === "timeout") {
        this.logger.warn(`Browser did not close within ${timeoutMs}ms; giving up on cleanup`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  /** Acquires a session, runs `work`, and releases the session on every exit path. */
  private async withSession<T>(
    runOptions: ScrapeRunOptions | undefined,
    work: (session: BrowserSession, signal: AbortSignal | undefined) => Promise<T>
  ): Promise<T> {
    const signal = runOptions?.signal;
    this.throwIfInterrupted(signal);

    const session = await this.sessionFactory();
    try {
      return await work(session, signal);
    } catch (error) {
      // An aborted sleep or navigation surfaces as its own error; report the interruption instead.
      if (signal?.aborted && !(error instanceof ScrapeInterruptedError)) {
        throw new ScrapeInterruptedError();
      }
      throw error;
    } finally {
      await this.releaseSession(session);
    }
  }

  private async extractCurrentPage(
    session: BrowserSession,
    signal: AbortSignal | undefined
  ): Promise<ReviewRecord[]> {
    const { selectors, timing } = this.options;
    await expandTruncatedReviews(session, {
      selectors,
      timing,
      sleep: (ms) => this.sleep(ms, signal),
      logger: this.logger
    });

    const snapshot = await session.content();
    return parseReviewsPage(snapshot, this.now(), selectors);
  }

  private async collectReviews(
    session: BrowserSession,
    url: string,
    signal: AbortSignal | undefined
  ): Promise<CollectedReviews> {
    const { selectors, timing } = this.options;

    // The review list only mounts reliably after a reload of the first load.
    await session.open(url);
    this.throwIfInterrupted(signal);
    await session.reload();
    this.throwIfInterrupted(signal);
    await this.requireSelector(session, selectors.reviewContainer);

    const lastPage = parseLastPageNumber(await session.content(), selectors);
    this.logger.debug(`[scrape] ${lastPage} review page(s) at ${url}`);

    const reviews: ReviewCollection = [];
    for (let pageNumber = 1; pageNumber <= lastPage; pageNumber++) {
      this.throwIfInterrupted(signal);

      if (pageNumber > 1) {
        const pageButton = selectors.pageButton(pageNumber);
        await this.requireSelector(session, pageButton);
        await session.click(pageButton);
        await this.sleep(timing.pageTransitionSettleMs, signal);
        this.throwIfInterrupted(signal);
      }

      const pageReviews = await this.extractCurrentPage(session, signal);
      reviews.push(...pageReviews);
      this.logger.info(`Extracted ${pageReviews.length} reviews from page ${pageNumber}`);
    }

    return { reviews, pageCount: lastPage };
  }

  async scrape(url: string, runOptions?: ScrapeRunOptions): Promise<ReviewCollection> {
    const { reviews } = await this.withSession(runOptions, (session, signal) =>
      this.collectReviews(session, url, signal)
    );
    return reviews;
  }

  /** Scrapes every page and writes the reviews to `destination` only once all pages succeeded. */
  async run(
    url: string,
    destination: string,
    runOptions?: ScrapeRunOptions
  ): Promise<ScrapeRunSummary> {
    return this.withSession(runOptions, async (session, signal) => {
      const { reviews, pageCount } = await this.collectReviews(session, url, signal);
      this.throwIfInterrupted(signal);

      await this.sink.write(reviews, destination);
      this.logger.info(`Saved ${reviews.length} reviews to ${destination}`);

      return { reviewCount: reviews.length, pageCount, destination };
    });
  }
}
