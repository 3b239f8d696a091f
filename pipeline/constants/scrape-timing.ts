export interface ScrapeTiming {
  /** How long to look for "Selengkapnya" controls before assuming there are none. */
  expandControlTimeoutMs: number;
  postClickSettleMs: number;
  pageTransitionSettleMs: number;
  /** Fatal when exceeded: initial review list and every page button. */
  mandatoryWaitTimeoutMs: number;
  navigationTimeoutMs: number;
  networkIdleTimeoutMs: number;
  sessionCloseTimeoutMs: number;
}

export const DEFAULT_SCRAPE_TIMING: ScrapeTiming = {
  expandControlTimeoutMs: 500,
  postClickSettleMs: 200,
  pageTransitionSettleMs: 700,
  mandatoryWaitTimeoutMs: 10_000,
  navigationTimeoutMs: 60_000,
  networkIdleTimeoutMs: 15_000,
  sessionCloseTimeoutMs: 5_000
};
