/**
 * Funding announcements repository
 *
 * Data access layer for funding_announcements table.
 */

import type {
  FundingAnnouncement,
  FundingAnnouncementInput,
  PendingAnnouncement,
} from "@/types";
import { getDb } from "../connection";

/**
 * Insert the extracted fields of an accepted article
 *
 * @returns The announcement id
 * @throws Error if the article does not exist or already has an announcement
 */
export function insertFundingAnnouncement(
  input: FundingAnnouncementInput,
): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO funding_announcements (
      article_id, company_name, funding_stage, funding_amount,
      location, industry, description, extracted_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `,
    )
    .run(
      input.article_id,
      input.company_name,
      input.funding_stage,
      input.funding_amount,
      input.location,
      input.industry,
      input.description,
      input.extracted_at ?? new Date().toISOString(),
    );

  return Number(result.lastInsertRowid);
}

/**
 * Get announcement by id
 */
export function getFundingAnnouncementById(
  id: number,
): FundingAnnouncement | undefined {
  const db = getDb();
  return db
    .prepare<[number], FundingAnnouncement>(
      "SELECT * FROM funding_announcements WHERE id = ?",
    )
    .get(id);
}

/**
 * List announcements not yet included in a digest, joined with their article
 *
 * Only articles published (or, when the publication time is unknown,
 * processed) at or after `sinceIso` are returned, newest first.
 */
export function listPendingAnnouncements(
  sinceIso: string,
): PendingAnnouncement[] {
  const db = getDb();
  return db
    .prepare<[string], PendingAnnouncement>(
      `
    SELECT
      fa.id,
      fa.company_name,
      fa.funding_stage,
      fa.funding_amount,
      fa.location,
      fa.industry,
      fa.description,
      a.url,
      a.title,
      a.source,
      a.published_at,
      a.processed_at,
      a.relevance_score
    FROM funding_announcements fa
    JOIN articles a ON fa.article_id = a.id
    WHERE fa.included_in_digest = 0
      AND COALESCE(a.published_at, a.processed_at) >= ?
    ORDER BY COALESCE(a.published_at, a.processed_at) DESC, fa.id ASC
  `,
    )
    .all(sinceIso);
}

/**
 * Mark announcements as included in a digest
 *
 * @returns Number of announcements updated
 */
export function markAnnouncementsDigested(ids: number[]): number {
  if (ids.length === 0) {
    return 0;
  }

  const db = getDb();
  const placeholders = ids.map(() => "?").join(", ");
  const result = db
    .prepare<number[]>(
      `UPDATE funding_announcements SET included_in_digest = 1 WHERE id IN (${placeholders})`,
    )
    .run(...ids);
  return result.changes;
}
