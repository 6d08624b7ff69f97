/**
 * Document classifier
 *
 * Orchestrates scoring and extraction for a single document:
 * 1. Build the text blob (title + ". " + description)
 * 2. Score it
 * 3. Below threshold → rejected; the extractor is never invoked
 * 4. Otherwise extract fields and assemble the classification
 *
 * Rejection is a normal outcome, not an error.
 */

import type {
  ClassificationOutcome,
  ClassifierOptions,
  Document,
  PatternRegistry,
} from "@/types";
import {
  SUMMARY_MAX_LENGTH,
  TEXT_BLOB_SEPARATOR,
} from "@/constants/classification";
import { DEFAULT_RELEVANCE_THRESHOLD } from "@/constants/scoring";
import { computeScore } from "@/signal/scorer/scorer";
import { extractFields as defaultExtractFields } from "@/signal/extractor/fieldExtractor";
import { truncate } from "@/utils/text/textCleanup";
import * as logger from "@/logger";

/**
 * Joins title and description into the text blob scored and searched.
 */
export function buildTextBlob(document: Document): string {
  return `${document.title}${TEXT_BLOB_SEPARATOR}${document.description}`;
}

/**
 * Classifies a document as an accepted funding announcement or rejected.
 *
 * @param document - Document to classify (not mutated)
 * @param registry - Compiled pattern registry
 * @param options - Threshold (default 50) and an optional extractor override
 */
export function classifyDocument(
  document: Document,
  registry: PatternRegistry,
  options: ClassifierOptions = {},
): ClassificationOutcome {
  const threshold = options.threshold ?? DEFAULT_RELEVANCE_THRESHOLD;
  const extract = options.extractFields ?? defaultExtractFields;

  const text = buildTextBlob(document);
  const score = computeScore(text, registry);

  if (score < threshold) {
    logger.debug("Document below threshold", {
      score,
      threshold,
      title: document.title.slice(0, 50),
    });
    return { status: "rejected", document, score };
  }

  const fields = extract(text, document.title, registry);

  logger.info("Detected funding announcement", {
    companyName: fields.companyName,
    fundingStage: fields.fundingStage,
    score,
  });

  return {
    status: "accepted",
    classification: {
      document,
      score,
      fields,
      summary: truncate(document.description, SUMMARY_MAX_LENGTH),
    },
  };
}

/**
 * Binds a registry and options into a reusable classify function.
 */
export function createClassifier(
  registry: PatternRegistry,
  options: ClassifierOptions = {},
): (document: Document) => ClassificationOutcome {
  return (document) => classifyDocument(document, registry, options);
}
