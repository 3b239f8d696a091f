import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { stringify } from "csv-stringify/sync";
import type { ReviewRecord } from "../types/domain.js";

export interface ResultSink {
  write: (records: readonly ReviewRecord[], destination: string) => Promise<void>;
}

export const REVIEW_CSV_COLUMNS = [
  { key: "reviewerName", header: "name" },
  { key: "rating", header: "rating" },
  { key: "date", header: "date" },
  { key: "text", header: "text" }
] satisfies Array<{ key: keyof ReviewRecord; header: string }>;

export const formatReviewsCsv = (records: readonly ReviewRecord[]): string =>
  stringify([...records], {
    header: true,
    columns: REVIEW_CSV_COLUMNS
  });

/**
 * Writes reviews as UTF-8 CSV. The file is written next to the destination
 * and renamed into place, so readers never see a half-written file.
 */
export class CsvResultSink implements ResultSink {
  async write(records: readonly ReviewRecord[], destination: string): Promise<void> {
    await mkdir(dirname(destination), { recursive: true });

    const temporaryPath = `${destination}.${process.pid}.tmp`;
    try {
      await writeFile(temporaryPath, formatReviewsCsv(records), "utf8");
      await rename(temporaryPath, destination);
    } catch (error) {
      await rm(temporaryPath, { force: true });
      throw error;
    }
  }
}
