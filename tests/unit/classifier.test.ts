/**
 * Unit tests for the document classifier
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect, vi } from "vitest";
import {
  buildTextBlob,
  classifyDocument,
  createClassifier,
} from "@/signal/classifier";
import { extractFields } from "@/signal/extractor";
import { compilePatternRegistry } from "@/patterns";
import type { Classification, ClassificationOutcome } from "@/types";
import {
  createTestDocument,
  loadTestRegistry,
  rawRegistry,
} from "../helpers/registry";

const registry = loadTestRegistry();

function expectAccepted(outcome: ClassificationOutcome): Classification {
  if (outcome.status !== "accepted") {
    throw new Error(`Expected accepted outcome, got score ${outcome.score}`);
  }
  return outcome.classification;
}

const fundingDocument = createTestDocument({
  title: "Acme raises $10M Series A",
  description:
    "Acme, a London-based fintech, has secured $10 million in Series A funding.",
  url: "https://example.com/acme-series-a",
  source: "Test Wire",
});

const productDocument = createTestDocument({
  title: "Apple releases new iPhone features",
  description:
    "Apple announced new features for the iPhone today, including improved camera capabilities.",
  url: "https://example.com/product-launch",
});

describe("buildTextBlob", () => {
  it("should join title and description", () => {
    expect(
      buildTextBlob(createTestDocument({ title: "T", description: "D" })),
    ).toBe("T. D");
  });
});

describe("classifyDocument", () => {
  it("should classify a funding announcement end to end", () => {
    const classification = expectAccepted(
      classifyDocument(fundingDocument, registry),
    );

    expect(classification.score).toBe(100);
    expect(classification.fields).toEqual({
      companyName: "Acme",
      fundingStage: "Series A",
      fundingAmount: "$10M",
      location: "London",
      industry: "Fintech",
    });
    expect(classification.summary).toBe(fundingDocument.description);
    expect(classification.document).toBe(fundingDocument);
  });

  it("should reject unrelated documents without extracting fields", () => {
    const extractor = vi.fn(extractFields);

    const outcome = classifyDocument(productDocument, registry, {
      extractFields: extractor,
    });

    expect(outcome).toEqual({
      status: "rejected",
      document: productDocument,
      score: 0,
    });
    expect(extractor).not.toHaveBeenCalled();
  });

  it("should call the extractor once with blob, title and registry", () => {
    const extractor = vi.fn(extractFields);

    classifyDocument(fundingDocument, registry, { extractFields: extractor });

    expect(extractor).toHaveBeenCalledTimes(1);
    expect(extractor).toHaveBeenCalledWith(
      buildTextBlob(fundingDocument),
      fundingDocument.title,
      registry,
    );
  });

  it("should accept a score exactly at the default threshold", () => {
    const document = createTestDocument({
      title: "Acme raises money",
      description: "A fintech.",
    });

    const classification = expectAccepted(classifyDocument(document, registry));

    expect(classification.score).toBe(50);
    expect(classification.fields).toEqual({
      companyName: "Acme",
      fundingStage: "Unknown",
      fundingAmount: "Unknown",
      location: "Unknown",
      industry: "Fintech",
    });
  });

  it("should reject a score one below the default threshold", () => {
    const raw = rawRegistry();
    raw.rules[0].weight = 29;
    const lighter = compilePatternRegistry(raw);
    const document = createTestDocument({
      title: "Acme raises money",
      description: "A fintech.",
    });

    const outcome = classifyDocument(document, lighter);

    expect(outcome).toEqual({ status: "rejected", document, score: 49 });
  });

  it("should truncate the summary to 500 characters", () => {
    const document = createTestDocument({
      title: "Acme raises Series A in London",
      description: "a".repeat(600),
    });

    const classification = expectAccepted(classifyDocument(document, registry));

    expect(classification.score).toBe(80);
    expect(classification.summary).toHaveLength(500);
    expect(classification.document.description).toHaveLength(600);
  });

  it("should not mutate the document", () => {
    const document = Object.freeze({ ...fundingDocument });

    expect(() => classifyDocument(document, registry)).not.toThrow();
    expect(document).toEqual(fundingDocument);
  });
});

describe("createClassifier", () => {
  it("should bind a custom threshold", () => {
    const strict = createClassifier(registry, { threshold: 90 });
    const document = createTestDocument({
      title: "Acme raises Series A in London",
    });

    const outcome = strict(document);

    expect(outcome).toEqual({ status: "rejected", document, score: 80 });
  });

  it("should accept with the default threshold", () => {
    const classify = createClassifier(registry);

    expect(classify(fundingDocument).status).toBe("accepted");
  });
});
