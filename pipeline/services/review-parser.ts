import { load } from "cheerio";
import {
  DEFAULT_REVIEW_PAGE_SELECTORS,
  RATING_LABEL_MARKER,
  type ReviewPageSelectors
} from "../constants/review-page-selectors.js";
import { normalizeRelativeDate } from "./review-date-normalizer.js";
import { MISSING_FIELD, type PageSnapshot, type ReviewRecord } from "../types/domain.js";

const MAX_RATING = 5;

const normalizeText = (value: string): string => value.replace(/\s+/g, " ").trim();

const presentOrNull = <T extends { length: number }>(selection: T): T | null =>
  selection.length > 0 ? selection : null;

export const parseRatingLabel = (ariaLabel: string | null): number => {
  if (!ariaLabel || !RATING_LABEL_MARKER.test(ariaLabel)) {
    return 0;
  }

  const lastToken = ariaLabel.trim().split(/\s+/).at(-1) ?? "";
  if (!/^\d+$/.test(lastToken)) {
    return 0;
  }

  const rating = Number.parseInt(lastToken, 10);
  return rating <= MAX_RATING ? rating : 0;
};

export const parseReviewsPage = (
  snapshot: PageSnapshot,
  now: Date,
  selectors: ReviewPageSelectors = DEFAULT_REVIEW_PAGE_SELECTORS
): ReviewRecord[] => {
  const $ = load(snapshot.html);
  const reviews: ReviewRecord[] = [];

  $(selectors.reviewContainer).each((_, container) => {
    const $container = $(container);

    const ratingElement = presentOrNull($container.find(selectors.starRating).first());
    const rating = parseRatingLabel(ratingElement?.attr("aria-label") ?? null);

    const dateElement = presentOrNull($container.find(selectors.reviewDate).first());
    const rawDate = dateElement ? dateElement.text().trim() : MISSING_FIELD;

    const nameElement = presentOrNull($container.find(selectors.reviewerName).first());
    const reviewerName = nameElement ? normalizeText(nameElement.text()) : MISSING_FIELD;

    const textElement = presentOrNull($container.find(selectors.reviewText).first());
    let text = MISSING_FIELD;
    if (textElement) {
      // Line breaks inside the body are real paragraph breaks.
      textElement.find("br").replaceWith("\n");
      text = textElement.text().trim();
    }

    reviews.push({
      reviewerName,
      rating,
      date: normalizeRelativeDate(rawDate, now),
      text
    });
  });

  return reviews;
};

/** Highest numeric label in the pagination control, or 1 for a single page. */
export const parseLastPageNumber = (
  snapshot: PageSnapshot,
  selectors: ReviewPageSelectors = DEFAULT_REVIEW_PAGE_SELECTORS
): number => {
  const $ = load(snapshot.html);
  const pageNumbers = $(selectors.paginationItem)
    .map((_, button) => normalizeText($(button).text()))
    .get()
    .filter((label) => /^\d+$/.test(label))
    .map((label) => Number.parseInt(label, 10));

  return pageNumbers.length ? Math.max(1, ...pageNumbers) : 1;
};
