export interface ReviewPageSelectors {
  reviewContainer: string;
  starRating: string;
  reviewDate: string;
  reviewerName: string;
  reviewText: string;
  expandControlProbe: string;
  expandButton: string;
  paginationItem: string;
  pageButton: (pageNumber: number) => string;
}

export const EXPAND_LABEL = "Selengkapnya";

export const RATING_LABEL_MARKER = /bintang/i;

// Class names are the hashed ones the storefront currently ships; the test ids are stable.
export const DEFAULT_REVIEW_PAGE_SELECTORS: ReviewPageSelectors = {
  reviewContainer: "article.css-15m2bcr",
  starRating: "div[data-testid=\"icnStarRating\"]",
  reviewDate: "p.css-vqrjg4-unf-heading",
  reviewerName: "span.name",
  reviewText: "span[data-testid=\"lblItemUlasan\"]",
  expandControlProbe: "button.css-89c2tx",
  expandButton: `button:text-is("${EXPAND_LABEL}")`,
  paginationItem: "button.css-5p3bh2-unf-pagination-item",
  pageButton: (pageNumber) => `button[aria-label="Laman ${pageNumber}"]`
};
