export const MISSING_FIELD = "N/A";

export interface ReviewRecord {
  reviewerName: string;
  rating: number;
  date: string;
  text: string;
}

/**
 * Rendered HTML of one review page, captured once and parsed offline.
 * Never holds a reference to live browser nodes.
 */
export interface PageSnapshot {
  readonly html: string;
  readonly capturedAt: string;
}

export type ReviewCollection = ReviewRecord[];

export interface ScrapeRunSummary {
  reviewCount: number;
  pageCount: number;
  destination: string;
}

export const createPageSnapshot = (
  html: string,
  capturedAt: Date = new Date()
): PageSnapshot => Object.freeze({ html, capturedAt: capturedAt.toISOString() });
