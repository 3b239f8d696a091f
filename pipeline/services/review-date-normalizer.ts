const DAYS_PER_WEEK = 7;
const DAYS_PER_MONTH = 30;
const DAYS_PER_YEAR = 365;

const MORE_THAN_YEARS_REGEX = /lebih\s*dar[ai]\s*(\d+)/;

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export const formatIsoDate = (date: Date): string =>
  `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

const subtractDays = (now: Date, days: number): Date =>
  new Date(now.getFullYear(), now.getMonth(), now.getDate() - days);

const parseLeadingCount = (text: string): number | null => {
  const token = text.trim().split(/\s+/)[0] ?? "";
  return /^\d+$/.test(token) ? Number.parseInt(token, 10) : null;
};

const parseMoreThanYears = (text: string): number => {
  const match = MORE_THAN_YEARS_REGEX.exec(text);
  return match?.[1] ? Number.parseInt(match[1], 10) : 1;
};

/** Days before `now` described by the phrase, or null when it is not recognised. */
const resolveDaysAgo = (text: string): number | null => {
  if (text.includes("hari ini")) {
    return 0;
  }

  if (text.includes("kemarin")) {
    return 1;
  }

  if (text.includes("hari")) {
    return parseLeadingCount(text);
  }

  if (text.includes("minggu")) {
    const weeks = parseLeadingCount(text);
    return weeks === null ? null : weeks * DAYS_PER_WEEK;
  }

  if (text.includes("bulan")) {
    const months = parseLeadingCount(text);
    return months === null ? null : months * DAYS_PER_MONTH;
  }

  if (text.includes("tahun")) {
    const years = text.includes("lebih dari")
      ? parseMoreThanYears(text)
      : parseLeadingCount(text);
    return years === null ? null : years * DAYS_PER_YEAR;
  }

  return null;
};

/**
 * Converts an Indonesian relative date ("2 hari lalu", "kemarin",
 * "lebih dari 1 tahun lalu") into a local `YYYY-MM-DD` date.
 * Unrecognised input is returned unchanged.
 */
export const normalizeRelativeDate = (relativeText: string, now: Date): string => {
  const daysAgo = resolveDaysAgo(relativeText.toLowerCase());
  if (daysAgo === null || Number.isNaN(now.getTime())) {
    return relativeText;
  }

  const resolved = subtractDays(now, daysAgo);
  // Huge counts leave the four-digit year range (or the Date range entirely).
  const year = resolved.getFullYear();
  if (Number.isNaN(year) || year < 0 || year > 9999) {
    return relativeText;
  }

  return formatIsoDate(resolved);
};
