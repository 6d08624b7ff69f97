/**
 * Registry fixtures
 *
 * The production registry is loaded once from data/patterns.json;
 * rawRegistry() returns a fresh parsed copy for tests that need to
 * break it on purpose.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { loadPatternRegistry } from "@/patterns";
import type { Document, PatternRegistry, PatternRegistryRaw } from "@/types";

export const REGISTRY_PATH = join(process.cwd(), "data", "patterns.json");

export function loadTestRegistry(): PatternRegistry {
  return loadPatternRegistry(REGISTRY_PATH);
}

export function rawRegistry(): PatternRegistryRaw {
  const parsed: PatternRegistryRaw = JSON.parse(
    readFileSync(REGISTRY_PATH, "utf-8"),
  );
  return parsed;
}

export function createTestDocument(overrides: Partial<Document> = {}): Document {
  return {
    title: "Untitled",
    description: "",
    url: "https://example.com/article",
    source: "Test Wire",
    ...overrides,
  };
}
