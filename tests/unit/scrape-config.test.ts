import { describe, expect, it } from "vitest";
import {
  ScrapeConfigError,
  resolveScrapeConfig,
  wantsHelp
} from "../../pipeline/scripts/scrape-config.js";

const REVIEW_URL = "https://www.tokopedia.com/toko-contoh/produk-contoh/review";

describe("resolveScrapeConfig", () => {
  it("applies defaults", () => {
    expect(resolveScrapeConfig(["--url", REVIEW_URL], {})).toEqual({
      url: REVIEW_URL,
      output: "reviews.csv",
      chromePath: null,
      headless: false,
      blockResources: false,
      verbose: false
    });
  });

  it("prefers flags over environment variables", () => {
    const config = resolveScrapeConfig(
      ["-u", REVIEW_URL, "-o", "out/ulasan.csv", "--headless", "-c", "/usr/bin/chromium"],
      {
        REVIEW_URL: "https://www.tokopedia.com/lain/produk-lain/review",
        REVIEW_OUTPUT: "env.csv",
        HEADLESS: "false",
        BLOCK_RESOURCES: "Yes"
      }
    );

    expect(config).toEqual({
      url: REVIEW_URL,
      output: "out/ulasan.csv",
      chromePath: "/usr/bin/chromium",
      headless: true,
      blockResources: true,
      verbose: false
    });
  });

  it("reads everything from the environment", () => {
    const config = resolveScrapeConfig([], {
      REVIEW_URL,
      CHROME_PATH: "  ",
      VERBOSE: "1"
    });

    expect(config).toMatchObject({ url: REVIEW_URL, chromePath: null, verbose: true });
  });

  it("requires a URL", () => {
    expect(() => resolveScrapeConfig([], {})).toThrow(ScrapeConfigError);
    expect(() => resolveScrapeConfig([], {})).toThrow(
      "url: a review page URL is required (--url or REVIEW_URL)"
    );
  });

  it("rejects non-http URLs", () => {
    expect(() => resolveScrapeConfig(["--url", "ftp://example.com/review"], {})).toThrow(
      "url: must be an http(s) URL"
    );
  });

  it("rejects unreadable boolean environment values", () => {
    expect(() => resolveScrapeConfig(["--url", REVIEW_URL], { HEADLESS: "maybe" })).toThrow(
      /Invalid environment:\n {2}- HEADLESS:/
    );
  });

  it("rejects unknown flags", () => {
    expect(() => resolveScrapeConfig(["--url", REVIEW_URL, "--pages", "3"], {})).toThrow(
      ScrapeConfigError
    );
  });
});

describe("wantsHelp", () => {
  it("recognises the help flag", () => {
    expect(wantsHelp(["-h"])).toBe(true);
    expect(wantsHelp(["--url", REVIEW_URL, "--help"])).toBe(true);
  });

  it("does not mistake an option value for the help flag", () => {
    expect(wantsHelp(["--url", REVIEW_URL, "--output=-h"])).toBe(false);
    expect(wantsHelp(["--url", REVIEW_URL, "-o-h"])).toBe(false);
  });

  it("reads an output file named -h as the output path", () => {
    expect(resolveScrapeConfig(["--url", REVIEW_URL, "--output=-h"], {}).output).toBe("-h");
  });
});
