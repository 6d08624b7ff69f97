/**
 * Classification type definitions
 */

import type { Document } from "./documents";
import type { PatternRegistry } from "./patterns";

/**
 * Structured fields extracted from an accepted document.
 *
 * Every value is a non-empty string. A field that could not be
 * extracted holds the UNKNOWN_FIELD sentinel.
 */
export type ExtractedFields = {
  companyName: string;
  fundingStage: string;
  fundingAmount: string;
  location: string;
  industry: string;
};

/**
 * Result of an accepted document. Only exists when score >= threshold.
 */
export type Classification = {
  document: Document;
  score: number;
  fields: ExtractedFields;
  /** Description truncated for storage */
  summary: string;
};

export type ClassificationOutcome =
  | { status: "accepted"; classification: Classification }
  | { status: "rejected"; document: Document; score: number };

/**
 * Field extraction entry point, injectable for instrumentation.
 */
export type FieldExtractorFn = (
  text: string,
  title: string,
  registry: PatternRegistry,
) => ExtractedFields;

export type ClassifierOptions = {
  /** Minimum score (inclusive) for acceptance */
  threshold?: number;
  /** Extractor invoked only for accepted documents */
  extractFields?: FieldExtractorFn;
};
