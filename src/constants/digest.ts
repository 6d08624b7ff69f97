/**
 * Digest rendering constants
 */

import type { DigestType } from "@/types";

/**
 * Days of pending announcements collected per digest type.
 */
export const DIGEST_WINDOW_DAYS: Record<DigestType, number> = {
  daily: 1,
  weekly: 7,
};

export const DIGEST_SUBJECT_TEMPLATES: Record<DigestType, string> = {
  daily: "Daily Funding Digest - {count} New Opportunities - {date}",
  weekly: "Weekly Funding Digest - {count} New Opportunities - Week of {date}",
};

/**
 * Description characters shown per digest entry.
 */
export const DIGEST_DESCRIPTION_PREVIEW_LENGTH = 200;

export const DIGEST_RULE = "=".repeat(60);

export const DEFAULT_DIGEST_OUTPUT_DIR = "data/digests";
