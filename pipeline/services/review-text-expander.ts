import type { BrowserSession } from "./browser-session.js";
import type { ReviewPageSelectors } from "../constants/review-page-selectors.js";
import type { ScrapeTiming } from "../constants/scrape-timing.js";
import type { ScrapeLogger } from "../utils/scrape-logger.js";
import { errorMessage } from "./scrape-errors.js";

export type Sleep = (ms: number) => Promise<void>;

interface TextExpanderOptions {
  selectors: ReviewPageSelectors;
  timing: ScrapeTiming;
  sleep: Sleep;
  logger: ScrapeLogger;
}

/**
 * Clicks every "Selengkapnya" control on the current page so truncated
 * review bodies are rendered in full. Returns the number of successful clicks.
 */
export const expandTruncatedReviews = async (
  session: BrowserSession,
  { selectors, timing, sleep, logger }: TextExpanderOptions
): Promise<number> => {
  const hasControls = await session.waitFor(
    selectors.expandControlProbe,
    timing.expandControlTimeoutMs
  );
  if (!hasControls) {
    return 0;
  }

  const controls = await session.locateAll(selectors.expandButton);
  let expandedCount = 0;

  for (const [index, control] of controls.entries()) {
    try {
      await control.click();
    } catch (clickError) {
      // A previous click can re-render the list and detach later controls.
      logger.debug(`[expand] control ${index + 1}/${controls.length} skipped: ${errorMessage(clickError)}`);
      continue;
    }

    expandedCount += 1;
    await sleep(timing.postClickSettleMs);
  }

  logger.debug(`[expand] expanded ${expandedCount}/${controls.length} review(s)`);
  return expandedCount;
};
