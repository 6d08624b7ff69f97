/**
 * Articles repository
 *
 * Data access layer for articles table. The URL is the deduplication key.
 */

import type { Article, ArticleInput, StoreStats } from "@/types";
import { getDb } from "../connection";
import * as logger from "@/logger";

/**
 * Check whether a document URL has already been processed
 */
export function isArticleProcessed(url: string): boolean {
  const db = getDb();
  const row = db
    .prepare<[string], { found: number }>(
      "SELECT 1 AS found FROM articles WHERE url = ?",
    )
    .get(url);
  return row !== undefined;
}

/**
 * Insert a processed article
 *
 * Returns the new article id, or null when the URL already exists
 * (the existing row is left untouched).
 */
export function insertArticle(input: ArticleInput): number | null {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO articles (
      url, title, source, published_at, processed_at,
      is_funding_related, relevance_score
    )
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(url) DO NOTHING
  `,
    )
    .run(
      input.url,
      input.title,
      input.source,
      input.published_at ?? null,
      input.processed_at ?? new Date().toISOString(),
      input.is_funding_related ? 1 : 0,
      input.relevance_score,
    );

  if (result.changes === 0) {
    logger.warn("Duplicate article URL", { url: input.url });
    return null;
  }

  return Number(result.lastInsertRowid);
}

/**
 * Get article by URL
 */
export function getArticleByUrl(url: string): Article | undefined {
  const db = getDb();
  return db
    .prepare<[string], Article>("SELECT * FROM articles WHERE url = ?")
    .get(url);
}

/**
 * Delete articles processed before a cutoff (ISO timestamp)
 *
 * Their announcements are removed by ON DELETE CASCADE.
 *
 * @returns Number of articles deleted
 */
export function deleteArticlesProcessedBefore(cutoffIso: string): number {
  const db = getDb();
  const result = db
    .prepare("DELETE FROM articles WHERE processed_at < ?")
    .run(cutoffIso);
  return result.changes;
}

/**
 * Store-wide counters for run summaries
 */
export function getStoreStats(): StoreStats {
  const db = getDb();
  const row = db
    .prepare<
      [],
      {
        total_articles: number;
        funding_articles: number;
        total_announcements: number;
        digested_announcements: number;
      }
    >(
      `
    SELECT
      (SELECT COUNT(*) FROM articles) AS total_articles,
      (SELECT COUNT(*) FROM articles WHERE is_funding_related = 1) AS funding_articles,
      (SELECT COUNT(*) FROM funding_announcements) AS total_announcements,
      (SELECT COUNT(*) FROM funding_announcements WHERE included_in_digest = 1) AS digested_announcements
  `,
    )
    .get();

  const totalAnnouncements = row?.total_announcements ?? 0;
  const digestedAnnouncements = row?.digested_announcements ?? 0;

  return {
    totalArticles: row?.total_articles ?? 0,
    fundingArticles: row?.funding_articles ?? 0,
    totalAnnouncements,
    digestedAnnouncements,
    pendingAnnouncements: totalAnnouncements - digestedAnnouncements,
  };
}
