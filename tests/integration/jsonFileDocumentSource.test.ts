/**
 * Integration tests for the JSON file document source
 *
 * Reads real temp files; no DB, no network
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  DocumentSourceError,
  JsonFileDocumentSource,
  parseDocumentRecord,
} from "@/documentSources";

describe("JsonFileDocumentSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "funding-monitor-docs-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("should read valid records and skip invalid ones", async () => {
    const filePath = writeJson(
      "documents.json",
      JSON.stringify([
        {
          title: " Acme raises $10M ",
          description: "Series A for a London fintech.",
          url: "https://example.com/a",
          source: "Test Wire",
          publishedAt: "2026-03-05T08:00:00.000Z",
        },
        { title: "No url", source: "Test Wire" },
        42,
        {
          title: "Initech secures funding",
          url: "https://example.com/b",
          source: "Test Wire",
        },
      ]),
    );
    const source = new JsonFileDocumentSource(filePath);

    const documents = await source.fetchDocuments();

    expect(source.name).toBe("json:documents.json");
    expect(documents).toEqual([
      {
        document: {
          title: "Acme raises $10M",
          description: "Series A for a London fintech.",
          url: "https://example.com/a",
          source: "Test Wire",
        },
        publishedAt: "2026-03-05T08:00:00.000Z",
      },
      {
        document: {
          title: "Initech secures funding",
          description: "",
          url: "https://example.com/b",
          source: "Test Wire",
        },
        publishedAt: null,
      },
    ]);
  });

  it("should reject a file that is not an array", async () => {
    const filePath = writeJson("object.json", '{"title": "x"}');

    await expect(
      new JsonFileDocumentSource(filePath).fetchDocuments(),
    ).rejects.toThrow(DocumentSourceError);
  });

  it("should reject malformed JSON", async () => {
    const filePath = writeJson("broken.json", "[{");

    await expect(
      new JsonFileDocumentSource(filePath).fetchDocuments(),
    ).rejects.toThrow(/^Document source failed: /);
  });

  it("should reject a missing file", async () => {
    await expect(
      new JsonFileDocumentSource(join(dir, "missing.json")).fetchDocuments(),
    ).rejects.toThrow(DocumentSourceError);
  });
});

describe("parseDocumentRecord", () => {
  it("should reject blank required fields", () => {
    expect(
      parseDocumentRecord({ title: "  ", url: "https://example.com", source: "x" }),
    ).toBeNull();
  });

  it("should normalize publication dates to ISO 8601 UTC", () => {
    const parsed = parseDocumentRecord({
      title: "T",
      url: "https://example.com/t",
      source: "S",
      publishedAt: "Sun, 01 Mar 2026 00:00:00 GMT",
    });

    expect(parsed?.publishedAt).toBe("2026-03-01T00:00:00.000Z");
  });

  it("should drop an unparseable publication date", () => {
    const parsed = parseDocumentRecord({
      title: "T",
      url: "https://example.com/t",
      source: "S",
      publishedAt: "last Tuesday",
    });

    expect(parsed?.publishedAt).toBeNull();
  });

  it("should ignore a non-string publication date", () => {
    expect(
      parseDocumentRecord({
        title: "T",
        url: "https://example.com/t",
        source: "S",
        publishedAt: 1700000000,
      }),
    ).toEqual({
      document: {
        title: "T",
        description: "",
        url: "https://example.com/t",
        source: "S",
      },
      publishedAt: null,
    });
  });
});
