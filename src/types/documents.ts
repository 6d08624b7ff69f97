/**
 * Document type definitions
 *
 * Documents are produced by an ingestion collaborator (see DocumentSource)
 * and are read-only to the classification engine.
 */

/**
 * A news-style text document. Title and description are plain text
 * (HTML already stripped by the producer).
 */
export type Document = {
  readonly title: string;
  readonly description: string;
  readonly url: string;
  /** Publication the document came from (e.g., "TechCrunch") */
  readonly source: string;
};

/**
 * Document as handed over by a source, with its publication time
 * when the source knows it.
 */
export type IngestedDocument = {
  document: Document;
  /** ISO 8601 timestamp, null when unknown */
  publishedAt: string | null;
};
