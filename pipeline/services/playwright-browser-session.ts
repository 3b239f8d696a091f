import {
  chromium,
  errors,
  type Browser,
  type BrowserContextOptions,
  type LaunchOptions,
  type Page
} from "playwright";
import type { BrowserSession, ClickTarget } from "./browser-session.js";
import { DEFAULT_SCRAPE_TIMING, type ScrapeTiming } from "../constants/scrape-timing.js";
import { installResourceBlockingRoutes } from "../utils/resource-blocking.js";
import { silentLogger, type ScrapeLogger } from "../utils/scrape-logger.js";
import { createPageSnapshot, type PageSnapshot } from "../types/domain.js";

export interface PlaywrightSessionOptions {
  headless: boolean;
  executablePath: string | null;
  blockResources: boolean;
  timing?: ScrapeTiming;
  logger?: ScrapeLogger;
}

/**
 * Runs a Playwright wait and reports whether it finished in time.
 * Only Playwright's own timeout counts as "not found"; anything else is rethrown.
 */
export const resolvesBeforeTimeout = async (wait: () => Promise<unknown>): Promise<boolean> => {
  try {
    await wait();
    return true;
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      return false;
    }
    throw error;
  }
};

export class PlaywrightBrowserSession implements BrowserSession {
  private closed = false;

  private readonly timing: ScrapeTiming;

  private readonly logger: ScrapeLogger;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    options?: { timing?: ScrapeTiming; logger?: ScrapeLogger }
  ) {
    this.timing = options?.timing ?? DEFAULT_SCRAPE_TIMING;
    this.logger = options?.logger ?? silentLogger;
  }

  private async waitForNetworkIdle(label: string): Promise<void> {
    const idle = await resolvesBeforeTimeout(() =>
      this.page.waitForLoadState("networkidle", { timeout: this.timing.networkIdleTimeoutMs })
    );
    this.logger.debug(
      idle ? `[browser] ${label}: networkidle reached` : `[browser] ${label}: networkidle timeout (non-fatal)`
    );
  }

  async open(url: string): Promise<void> {
    this.logger.debug(`[browser] → ${url}`);
    const response = await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: this.timing.navigationTimeoutMs
    });
    if (response) {
      this.logger.debug(`[browser] HTTP ${response.status()}`);
    }
    await this.waitForNetworkIdle("open");
  }

  async reload(): Promise<void> {
    await this.page.reload({
      waitUntil: "domcontentloaded",
      timeout: this.timing.navigationTimeoutMs
    });
    await this.waitForNetworkIdle("reload");
  }

  waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    return resolvesBeforeTimeout(() =>
      this.page.locator(selector).first().waitFor({ state: "attached", timeout: timeoutMs })
    );
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: this.timing.mandatoryWaitTimeoutMs });
  }

  async locateAll(selector: string): Promise<ClickTarget[]> {
    const locators = await this.page.locator(selector).all();
    return locators.map((locator) => ({
      click: async () => {
        await locator.click({ timeout: this.timing.mandatoryWaitTimeoutMs });
      }
    }));
  }

  async content(): Promise<PageSnapshot> {
    return createPageSnapshot(await this.page.content());
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.browser.close();
  }
}

/**
 * Playwright's own signal handlers would close the browser and exit the
 * process before the scraper's interruption path runs, so they stay off.
 */
export const buildLaunchOptions = (
  options: Pick<PlaywrightSessionOptions, "headless" | "executablePath">
): LaunchOptions => ({
  headless: options.headless,
  handleSIGINT: false,
  handleSIGTERM: false,
  handleSIGHUP: false,
  ...(options.executablePath ? { executablePath: options.executablePath } : {})
});

// No timezone pin: relative review dates are resolved against the host clock.
export const buildContextOptions = (): BrowserContextOptions => ({
  locale: "id-ID",
  viewport: { width: 1366, height: 900 }
});

export const launchPlaywrightSession = async (
  options: PlaywrightSessionOptions
): Promise<PlaywrightBrowserSession> => {
  const logger = options.logger ?? silentLogger;
  const browser = await chromium.launch(buildLaunchOptions(options));

  try {
    const context = await browser.newContext(buildContextOptions());
    if (options.blockResources) {
      await installResourceBlockingRoutes(context, logger.debug);
    }
    const page = await context.newPage();

    return new PlaywrightBrowserSession(browser, page, { timing: options.timing, logger });
  } catch (error) {
    await browser.close();
    throw error;
  }
};
