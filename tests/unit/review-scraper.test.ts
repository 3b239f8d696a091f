import { describe, expect, it, vi } from "vitest";
import { ReviewScraper } from "../../pipeline/services/review-scraper.js";
import {
  MandatoryWaitTimeoutError,
  ScrapeInterruptedError
} from "../../pipeline/services/scrape-errors.js";
import type { ReviewRecord } from "../../pipeline/types/domain.js";
import {
  EXPAND_CONTROL_HTML,
  FakeReviewSite,
  createRecordingLogger,
  makeReviews,
  renderReviewPage,
  type FakeReviewPage
} from "../review-site-fixtures.js";

const REVIEW_URL = "https://www.tokopedia.com/toko-contoh/produk-contoh/review";
const DESTINATION = "out/reviews.csv";

const now = () => new Date(2024, 2, 15, 10, 30, 0);

const twoPageSite = (): FakeReviewPage[] => [
  { html: renderReviewPage(makeReviews("Page1", 5), { paginationLabels: ["1", "2", "Next"] }) },
  { html: renderReviewPage(makeReviews("Page2", 3), { paginationLabels: ["1", "2", "Next"] }) }
];

const makeHarness = (site: FakeReviewSite) => {
  const sink = {
    write: vi.fn(async (_records: readonly ReviewRecord[], _destination: string) => {})
  };
  const logger = createRecordingLogger();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const sessionFactory = vi.fn(async () => site);
  const scraper = new ReviewScraper({ sessionFactory, sink, logger, sleep, now });
  return { scraper, sink, logger, sleep, sessionFactory };
};

describe("ReviewScraper", () => {
  it("collects every page in order and writes once", async () => {
    const site = new FakeReviewSite(twoPageSite());
    const { scraper, sink, logger, sleep } = makeHarness(site);

    const summary = await scraper.run(REVIEW_URL, DESTINATION);

    expect(summary).toEqual({ reviewCount: 8, pageCount: 2, destination: DESTINATION });
    expect(sink.write).toHaveBeenCalledTimes(1);

    const [records, destination] = sink.write.mock.calls[0] ?? [];
    expect(destination).toBe(DESTINATION);
    expect(records?.map((record) => record.reviewerName)).toEqual([
      "Page1 1",
      "Page1 2",
      "Page1 3",
      "Page1 4",
      "Page1 5",
      "Page2 1",
      "Page2 2",
      "Page2 3"
    ]);
    expect(records?.[0]).toEqual({
      reviewerName: "Page1 1",
      rating: 1,
      date: "2024-03-14",
      text: "Ulasan Page1 nomor 1"
    });

    expect(logger.infos).toEqual([
      "Extracted 5 reviews from page 1",
      "Extracted 3 reviews from page 2",
      "Saved 8 reviews to out/reviews.csv"
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([700]);
    expect(site.closeCount).toBe(1);
  });

  it("loads, reloads and waits for the review list before paginating", async () => {
    const site = new FakeReviewSite(twoPageSite());
    const { scraper } = makeHarness(site);

    await scraper.scrape(REVIEW_URL);

    expect(site.calls).toEqual([
      `open ${REVIEW_URL}`,
      "reload",
      "waitFor article.css-15m2bcr 10000",
      "content",
      "waitFor button.css-89c2tx 500",
      "content",
      "waitFor button[aria-label=\"Laman 2\"] 10000",
      "click button[aria-label=\"Laman 2\"]",
      "waitFor button.css-89c2tx 500",
      "content",
      "close"
    ]);
  });

  it("treats a listing without pagination as a single page", async () => {
    const site = new FakeReviewSite([{ html: renderReviewPage(makeReviews("Only", 2)) }]);
    const { scraper, sleep } = makeHarness(site);

    const reviews = await scraper.scrape(REVIEW_URL);

    expect(reviews).toHaveLength(2);
    expect(site.calls.some((call) => call.startsWith("click"))).toBe(false);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("extracts expanded review text", async () => {
    const truncated = [{ name: "Budi", ratingLabel: "bintang 5", date: "kemarin", text: "Barangnya bagus tapi..." }];
    const expanded = [{ name: "Budi", ratingLabel: "bintang 5", date: "kemarin", text: "Barangnya bagus tapi kardusnya penyok." }];
    const site = new FakeReviewSite([
      {
        html: renderReviewPage(truncated, { extraHtml: EXPAND_CONTROL_HTML }),
        expandedHtml: renderReviewPage(expanded),
        expandControls: ["ok"]
      }
    ]);
    const { scraper, sleep } = makeHarness(site);

    const reviews = await scraper.scrape(REVIEW_URL);

    expect(reviews[0]?.text).toBe("Barangnya bagus tapi kardusnya penyok.");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200]);
  });

  it("keeps sibling reviews intact when one lacks a rating", async () => {
    const site = new FakeReviewSite([
      {
        html: renderReviewPage([
          { name: "Budi", ratingLabel: "bintang 5", date: "kemarin", text: "Mantap" },
          { name: "Rina", date: "kemarin", text: "Lumayan" },
          { name: "Dewi", ratingLabel: "bintang 4", date: "kemarin", text: "Oke" }
        ])
      }
    ]);
    const { scraper } = makeHarness(site);

    const reviews = await scraper.scrape(REVIEW_URL);

    expect(reviews.map((review) => review.rating)).toEqual([5, 0, 4]);
    expect(reviews[1]).toEqual({ reviewerName: "Rina", rating: 0, date: "2024-03-14", text: "Lumayan" });
  });

  it("aborts without writing when the review list never appears", async () => {
    const site = new FakeReviewSite([{ html: "<html><body><p>Memuat...</p></body></html>" }]);
    const { scraper, sink } = makeHarness(site);

    await expect(scraper.run(REVIEW_URL, DESTINATION)).rejects.toBeInstanceOf(
      MandatoryWaitTimeoutError
    );
    expect(sink.write).not.toHaveBeenCalled();
    expect(site.closeCount).toBe(1);
  });

  it("aborts without writing when a page button is missing", async () => {
    const site = new FakeReviewSite([
      { html: renderReviewPage(makeReviews("Page1", 2), { paginationLabels: ["1", "2", "3"] }) },
      { html: renderReviewPage(makeReviews("Page2", 2), { paginationLabels: ["1", "2"] }) }
    ]);
    const { scraper, sink, logger } = makeHarness(site);

    await expect(scraper.run(REVIEW_URL, DESTINATION)).rejects.toThrow(
      "Timed out after 10000ms waiting for button[aria-label=\"Laman 3\"]"
    );
    expect(logger.infos).toEqual([
      "Extracted 2 reviews from page 1",
      "Extracted 2 reviews from page 2"
    ]);
    expect(sink.write).not.toHaveBeenCalled();
    expect(site.closeCount).toBe(1);
  });

  it("stops paginating and closes the browser when interrupted", async () => {
    const site = new FakeReviewSite(twoPageSite());
    const { scraper, sink, logger, sleep } = makeHarness(site);
    const abortController = new AbortController();
    sleep.mockImplementation(async () => {
      abortController.abort();
    });

    await expect(
      scraper.run(REVIEW_URL, DESTINATION, { signal: abortController.signal })
    ).rejects.toBeInstanceOf(ScrapeInterruptedError);

    expect(logger.infos).toEqual(["Extracted 5 reviews from page 1"]);
    expect(sink.write).not.toHaveBeenCalled();
    expect(site.closeCount).toBe(1);
  });

  it("stops before reloading when interrupted during navigation", async () => {
    const abortController = new AbortController();
    class InterruptedOnOpen extends FakeReviewSite {
      async open(url: string): Promise<void> {
        await super.open(url);
        abortController.abort();
      }
    }
    const site = new InterruptedOnOpen(twoPageSite());
    const { scraper, sink } = makeHarness(site);

    await expect(
      scraper.run(REVIEW_URL, DESTINATION, { signal: abortController.signal })
    ).rejects.toBeInstanceOf(ScrapeInterruptedError);

    expect(site.calls).toEqual([`open ${REVIEW_URL}`, "close"]);
    expect(sink.write).not.toHaveBeenCalled();
  });

  it("stops before waiting for the review list when interrupted during reload", async () => {
    const abortController = new AbortController();
    class InterruptedOnReload extends FakeReviewSite {
      async reload(): Promise<void> {
        await super.reload();
        abortController.abort();
      }
    }
    const site = new InterruptedOnReload(twoPageSite());
    const { scraper } = makeHarness(site);

    await expect(
      scraper.scrape(REVIEW_URL, { signal: abortController.signal })
    ).rejects.toBeInstanceOf(ScrapeInterruptedError);

    expect(site.calls).toEqual([`open ${REVIEW_URL}`, "reload", "close"]);
  });

  it("reports an aborted settle delay as an interruption", async () => {
    const site = new FakeReviewSite(twoPageSite());
    const { scraper, sleep } = makeHarness(site);
    const abortController = new AbortController();
    sleep.mockImplementation(async () => {
      abortController.abort();
      throw new Error("The operation was aborted");
    });

    await expect(
      scraper.scrape(REVIEW_URL, { signal: abortController.signal })
    ).rejects.toBeInstanceOf(ScrapeInterruptedError);
    expect(site.closeCount).toBe(1);
  });

  it("does not launch a browser for an already aborted run", async () => {
    const site = new FakeReviewSite(twoPageSite());
    const { scraper, sessionFactory } = makeHarness(site);
    const abortController = new AbortController();
    abortController.abort();

    await expect(
      scraper.run(REVIEW_URL, DESTINATION, { signal: abortController.signal })
    ).rejects.toBeInstanceOf(ScrapeInterruptedError);
    expect(sessionFactory).not.toHaveBeenCalled();
  });

  it("logs a failed browser close without failing the run", async () => {
    const site = new FakeReviewSite(
      [{ html: renderReviewPage(makeReviews("Only", 1)) }],
      new Error("browser already disconnected")
    );
    const { scraper, logger } = makeHarness(site);

    await expect(scraper.run(REVIEW_URL, DESTINATION)).resolves.toMatchObject({ reviewCount: 1 });
    expect(logger.warnings).toEqual(["Failed to close browser: browser already disconnected"]);
  });
});
