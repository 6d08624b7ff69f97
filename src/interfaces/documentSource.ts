/**
 * DocumentSource interface — contract for document acquisition
 *
 * Sources (JSON files, RSS readers, ...) hand over plain-text documents.
 * Fetching, parsing, retries and HTML stripping are the source's concern;
 * the classifier never re-sanitizes.
 */

import type { IngestedDocument } from "@/types";

export interface DocumentSource {
  /**
   * Source identifier used in logs
   */
  readonly name: string;

  /**
   * Fetch the current batch of documents
   *
   * Invalid records are skipped by the source; only unrecoverable
   * failures reject.
   */
  fetchDocuments(): Promise<IngestedDocument[]>;
}
