/**
 * Monitor run — one end-to-end pass
 *
 * 1. Fetch documents from the source
 * 2. Drop documents already stored (by URL) and in-batch duplicates
 * 3. Classify each new document and store it (article + announcement)
 * 4. Render and deliver a digest of pending announcements
 * 5. Delete articles past the retention window
 *
 * Classification is synchronous and pure; only the source and the sink
 * are awaited. A failed delivery leaves announcements pending.
 */

import type {
  ClassificationOutcome,
  IngestedDocument,
  MonitorDeps,
  MonitorRunSummary,
} from "@/types";
import {
  deleteArticlesProcessedBefore,
  getDb,
  getStoreStats,
  insertArticle,
  insertFundingAnnouncement,
  isArticleProcessed,
  listPendingAnnouncements,
  markAnnouncementsDigested,
} from "@/db";
import { createClassifier } from "@/signal/classifier/classifier";
import { renderDigest } from "@/digest/renderDigest";
import { DIGEST_WINDOW_DAYS } from "@/constants/digest";
import { MS_PER_DAY } from "@/constants/runner";
import { toIsoTimestamp } from "@/utils/dates";
import * as logger from "@/logger";

function daysBefore(date: Date, days: number): string {
  return new Date(date.getTime() - days * MS_PER_DAY).toISOString();
}

/**
 * Keeps documents whose URL is neither stored nor repeated earlier in the batch.
 */
export function selectNewDocuments(
  documents: IngestedDocument[],
): IngestedDocument[] {
  const seen = new Set<string>();
  const fresh: IngestedDocument[] = [];

  for (const item of documents) {
    const { url } = item.document;
    if (seen.has(url) || isArticleProcessed(url)) {
      logger.debug("Skipping already processed document", { url });
      continue;
    }
    seen.add(url);
    fresh.push(item);
  }

  return fresh;
}

/**
 * Persists an outcome: every document becomes an article row; accepted
 * ones also get a funding announcement. Both writes share a transaction.
 *
 * @param publishedAt - ISO 8601 UTC, compared as text by the digest window
 */
function storeOutcome(
  outcome: ClassificationOutcome,
  publishedAt: string | null,
  processedAt: string,
): void {
  const db = getDb();

  const persist = db.transaction(() => {
    if (outcome.status === "rejected") {
      insertArticle({
        url: outcome.document.url,
        title: outcome.document.title,
        source: outcome.document.source,
        published_at: publishedAt,
        processed_at: processedAt,
        is_funding_related: false,
        relevance_score: outcome.score,
      });
      return;
    }

    const { document, score, fields, summary } = outcome.classification;
    const articleId = insertArticle({
      url: document.url,
      title: document.title,
      source: document.source,
      published_at: publishedAt,
      processed_at: processedAt,
      is_funding_related: true,
      relevance_score: score,
    });

    if (articleId === null) {
      return;
    }

    insertFundingAnnouncement({
      article_id: articleId,
      company_name: fields.companyName,
      funding_stage: fields.fundingStage,
      funding_amount: fields.fundingAmount,
      location: fields.location,
      industry: fields.industry,
      description: summary,
      extracted_at: processedAt,
    });
  });

  persist();
}

/**
 * Renders and delivers pending announcements within the digest window.
 *
 * @returns Number of announcements marked as digested
 */
async function deliverPendingDigest(
  deps: MonitorDeps,
  now: Date,
): Promise<number> {
  const { digestType } = deps.config;
  const pending = listPendingAnnouncements(
    daysBefore(now, DIGEST_WINDOW_DAYS[digestType]),
  );

  if (pending.length === 0) {
    logger.info("No pending announcements for digest", { digestType });
    return 0;
  }

  const digest = renderDigest(pending, digestType, now);

  try {
    await deps.sink.deliver(digest);
  } catch (err) {
    logger.error("Digest delivery failed; announcements stay pending", {
      sink: deps.sink.name,
      pending: pending.length,
      error: err instanceof Error ? err.message : String(err),
    });
    return 0;
  }

  return markAnnouncementsDigested(pending.map((a) => a.id));
}

/**
 * Executes a single monitor pass.
 *
 * The database must be open and migrated. Source failures reject;
 * delivery failures are logged and reported as digested = 0.
 */
export async function runMonitorOnce(
  deps: MonitorDeps,
): Promise<MonitorRunSummary> {
  const now = (deps.now ?? (() => new Date()))();
  const processedAt = now.toISOString();
  const log = logger.withContext({ source: deps.source.name });

  const documents = await deps.source.fetchDocuments();
  const fresh = selectNewDocuments(documents);
  log.info("Documents selected", {
    fetched: documents.length,
    newDocuments: fresh.length,
  });

  const classify = createClassifier(deps.registry, {
    threshold: deps.config.relevanceThreshold,
  });

  let accepted = 0;
  let rejected = 0;
  for (const item of fresh) {
    const outcome = classify(item.document);
    storeOutcome(outcome, toIsoTimestamp(item.publishedAt), processedAt);
    if (outcome.status === "accepted") {
      accepted++;
    } else {
      rejected++;
    }
  }

  const digested = await deliverPendingDigest(deps, now);
  const cleanedUp = deleteArticlesProcessedBefore(
    daysBefore(now, deps.config.cleanupDays),
  );
  const stats = getStoreStats();

  log.info("Monitor run finished", {
    accepted,
    rejected,
    digested,
    cleanedUp,
    pendingAnnouncements: stats.pendingAnnouncements,
  });

  return {
    fetched: documents.length,
    newDocuments: fresh.length,
    accepted,
    rejected,
    digested,
    cleanedUp,
    stats,
  };
}
