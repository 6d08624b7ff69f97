/**
 * Plain-text digest rendering
 *
 * Turns pending announcements into a subject line and a plain-text body.
 * Dates are rendered in UTC so output depends only on the inputs.
 */

import type { DigestEntry, DigestType, RenderedDigest } from "@/types";
import {
  DIGEST_DESCRIPTION_PREVIEW_LENGTH,
  DIGEST_RULE,
  DIGEST_SUBJECT_TEMPLATES,
  DIGEST_WINDOW_DAYS,
} from "@/constants/digest";
import { truncate } from "@/utils/text/textCleanup";

/**
 * YYYY-MM-DD in UTC
 */
export function formatDigestDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYY-MM-DD HH:MM UTC
 */
function formatGeneratedAt(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export function renderDigestSubject(
  count: number,
  digestType: DigestType,
  now: Date,
): string {
  return DIGEST_SUBJECT_TEMPLATES[digestType]
    .replace("{count}", String(count))
    .replace("{date}", formatDigestDate(now));
}

function previewDescription(description: string): string {
  const preview = truncate(description, DIGEST_DESCRIPTION_PREVIEW_LENGTH);
  return preview !== description ? `${preview}...` : preview;
}

function renderEntry(entry: DigestEntry, position: number): string[] {
  return [
    `${position}. ${entry.company_name}`,
    `   Stage: ${entry.funding_stage}`,
    `   Amount: ${entry.funding_amount}`,
    `   Location: ${entry.location}`,
    `   Industry: ${entry.industry}`,
    `   Description: ${previewDescription(entry.description)}`,
    `   Read more: ${entry.url}`,
    "",
  ];
}

/**
 * Renders a digest for the given announcements.
 *
 * An empty list still renders, with a "nothing found" line.
 */
export function renderDigest(
  entries: DigestEntry[],
  digestType: DigestType,
  now: Date,
): RenderedDigest {
  const days = DIGEST_WINDOW_DAYS[digestType];

  const lines = [
    `Funding Digest - ${formatDigestDate(now)}`,
    DIGEST_RULE,
    "",
    `${entries.length} new funding announcement(s) in the last ${days} day(s)`,
    "Geographic Focus: UK, Europe & Middle East",
    "Stages: Seed to Series C | Priority: Fintech & SaaS",
    "",
    DIGEST_RULE,
    "",
  ];

  if (entries.length > 0) {
    entries.forEach((entry, index) => {
      lines.push(...renderEntry(entry, index + 1));
    });
  } else {
    lines.push(
      "No new funding announcements matching your criteria were found in this period.",
      "",
    );
  }

  lines.push(DIGEST_RULE, `Generated on ${formatGeneratedAt(now)}`);

  return {
    digestType,
    subject: renderDigestSubject(entries.length, digestType, now),
    body: lines.join("\n"),
    count: entries.length,
  };
}
