import type { BrowserContext } from "playwright";

/**
 * Resource types review extraction never reads. Stylesheets stay: the
 * expand and pagination buttons must be laid out to be clickable.
 */
const BLOCKED_RESOURCE_TYPES = new Set(["image", "font", "media"]);

const BLOCKED_DOMAINS = [
  "googletagmanager.com",
  "google-analytics.com",
  "doubleclick.net",
  "connect.facebook.net",
  "analytics.tiktok.com"
];

export const shouldBlockRequest = (resourceType: string, url: string): boolean =>
  BLOCKED_RESOURCE_TYPES.has(resourceType) ||
  BLOCKED_DOMAINS.some((domain) => url.includes(domain));

/**
 * Install a route filter on a Playwright BrowserContext that aborts images,
 * fonts, media and third-party analytics requests.
 */
export const installResourceBlockingRoutes = async (
  context: BrowserContext,
  log?: (message: string) => void,
): Promise<void> => {
  log?.("[resource-blocking] Installing route filters (images, fonts, media, analytics)");

  await context.route("**/*", (route) => {
    const request = route.request();
    if (shouldBlockRequest(request.resourceType(), request.url())) {
      return route.abort();
    }

    return route.continue();
  });
};
