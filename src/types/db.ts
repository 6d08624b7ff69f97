/**
 * Database type definitions
 *
 * Types for database entities and repository inputs.
 * Aligned with schema in migrations/0001_init_articles.sql
 */

/**
 * Article entity. One row per processed document URL, accepted or not.
 */
export type Article = {
  id: number;
  url: string;
  title: string;
  source: string;
  published_at: string | null;
  processed_at: string;
  /** SQLite boolean (0 | 1) */
  is_funding_related: number;
  relevance_score: number;
};

export type ArticleInput = {
  url: string;
  title: string;
  source: string;
  published_at?: string | null;
  /** Defaults to now (ISO) when omitted */
  processed_at?: string;
  is_funding_related: boolean;
  relevance_score: number;
};

/**
 * Funding announcement entity, linked to its article
 * (deleted with it via ON DELETE CASCADE).
 */
export type FundingAnnouncement = {
  id: number;
  article_id: number;
  company_name: string;
  funding_stage: string;
  funding_amount: string;
  location: string;
  industry: string;
  description: string;
  /** SQLite boolean (0 | 1) */
  included_in_digest: number;
  extracted_at: string;
};

export type FundingAnnouncementInput = {
  article_id: number;
  company_name: string;
  funding_stage: string;
  funding_amount: string;
  location: string;
  industry: string;
  description: string;
  /** Defaults to now (ISO) when omitted */
  extracted_at?: string;
};

/**
 * Announcement joined with its article, as read for digest rendering.
 */
export type PendingAnnouncement = {
  id: number;
  company_name: string;
  funding_stage: string;
  funding_amount: string;
  location: string;
  industry: string;
  description: string;
  url: string;
  title: string;
  source: string;
  published_at: string | null;
  processed_at: string;
  relevance_score: number;
};

export type StoreStats = {
  totalArticles: number;
  fundingArticles: number;
  totalAnnouncements: number;
  digestedAnnouncements: number;
  pendingAnnouncements: number;
};
