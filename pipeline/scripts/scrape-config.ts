import { parseArgs } from "node:util";
import { z } from "zod";

export const DEFAULT_OUTPUT_PATH = "reviews.csv";

export const SCRAPE_USAGE = `Usage: scrape-reviews --url <review page URL> [options]

Options:
  -u, --url <url>            Product review page URL (env: REVIEW_URL)
  -o, --output <path>        CSV file to write (env: REVIEW_OUTPUT, default: ${DEFAULT_OUTPUT_PATH})
  -c, --chrome-path <path>   Chromium/Chrome executable (env: CHROME_PATH)
      --headless             Run the browser headless (env: HEADLESS)
      --block-resources      Skip images, fonts, media and analytics (env: BLOCK_RESOURCES)
  -v, --verbose              Debug logging (env: VERBOSE)
  -h, --help                 Show this message`;

export class ScrapeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScrapeConfigError";
  }
}

const TRUE_FLAG_VALUES = new Set(["1", "true", "yes"]);

const envFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "true", "yes", "0", "false", "no"]))
  .transform((value) => TRUE_FLAG_VALUES.has(value))
  .optional();

const envSchema = z.object({
  REVIEW_URL: z.string().optional(),
  REVIEW_OUTPUT: z.string().optional(),
  CHROME_PATH: z.string().optional(),
  HEADLESS: envFlag,
  BLOCK_RESOURCES: envFlag,
  VERBOSE: envFlag
});

const scrapeConfigSchema = z.object({
  url: z
    .string({ required_error: "a review page URL is required (--url or REVIEW_URL)" })
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL"),
  output: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
  chromePath: z.string().min(1).nullable().default(null),
  headless: z.boolean().default(false),
  blockResources: z.boolean().default(false),
  verbose: z.boolean().default(false)
});

export type ScrapeConfig = z.infer<typeof scrapeConfigSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `  - ${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("\n");

const blankToUndefined = (value: string | undefined): string | undefined =>
  value?.trim() ? value : undefined;

const parseFlags = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      options: {
        url: { type: "string", short: "u" },
        output: { type: "string", short: "o" },
        "chrome-path": { type: "string", short: "c" },
        headless: { type: "boolean" },
        "block-resources": { type: "boolean" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" }
      },
      strict: true,
      allowPositionals: false
    }).values;
  } catch (parseError) {
    throw new ScrapeConfigError(
      parseError instanceof Error ? parseError.message : String(parseError)
    );
  }
};

export const wantsHelp = (argv: string[]): boolean => parseFlags(argv).help === true;

/** Command-line flags take precedence over environment variables. */
export const resolveScrapeConfig = (
  argv: string[],
  env: NodeJS.ProcessEnv
): ScrapeConfig => {
  const flags = parseFlags(argv);

  const envResult = envSchema.safeParse({
    REVIEW_URL: blankToUndefined(env.REVIEW_URL),
    REVIEW_OUTPUT: blankToUndefined(env.REVIEW_OUTPUT),
    CHROME_PATH: blankToUndefined(env.CHROME_PATH),
    HEADLESS: blankToUndefined(env.HEADLESS),
    BLOCK_RESOURCES: blankToUndefined(env.BLOCK_RESOURCES),
    VERBOSE: blankToUndefined(env.VERBOSE)
  });
  if (!envResult.success) {
    throw new ScrapeConfigError(`Invalid environment:\n${formatIssues(envResult.error)}`);
  }
  const fromEnv = envResult.data;

  const configResult = scrapeConfigSchema.safeParse({
    url: flags.url ?? fromEnv.REVIEW_URL,
    output: flags.output ?? fromEnv.REVIEW_OUTPUT,
    chromePath: flags["chrome-path"] ?? fromEnv.CHROME_PATH,
    headless: flags.headless ?? fromEnv.HEADLESS,
    blockResources: flags["block-resources"] ?? fromEnv.BLOCK_RESOURCES,
    verbose: flags.verbose ?? fromEnv.VERBOSE
  });
  if (!configResult.success) {
    throw new ScrapeConfigError(`Invalid configuration:\n${formatIssues(configResult.error)}`);
  }

  return configResult.data;
};
