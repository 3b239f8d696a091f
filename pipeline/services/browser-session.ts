import type { PageSnapshot } from "../types/domain.js";

export interface ClickTarget {
  click: () => Promise<void>;
}

/**
 * The single browser tab a scrape run drives. `waitFor` reports a timeout as
 * `false`; deciding whether that is fatal is up to the caller.
 */
export interface BrowserSession {
  open: (url: string) => Promise<void>;
  reload: () => Promise<void>;
  waitFor: (selector: string, timeoutMs: number) => Promise<boolean>;
  click: (selector: string) => Promise<void>;
  locateAll: (selector: string) => Promise<ClickTarget[]>;
  content: () => Promise<PageSnapshot>;
  close: () => Promise<void>;
}

export type BrowserSessionFactory = () => Promise<BrowserSession>;
