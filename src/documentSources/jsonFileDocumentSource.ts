/**
 * JSON file document source
 *
 * Reads a JSON array of document records:
 *   [{ "title", "description", "url", "source", "publishedAt"? }, ...]
 *
 * Records without a string title, url or source are skipped with a
 * warning; a missing description becomes "". publishedAt is normalized
 * to ISO 8601 UTC, or null when it does not parse. Title and
 * description are expected to be plain text already.
 */

import { readFile } from "fs/promises";
import * as path from "path";
import type { IngestedDocument } from "@/types";
import type { DocumentSource } from "@/interfaces/documentSource";
import { toIsoTimestamp } from "@/utils/dates";
import * as logger from "@/logger";

/**
 * Error thrown when the source file cannot be read or is not an array.
 */
export class DocumentSourceError extends Error {
  constructor(message: string) {
    super(`Document source failed: ${message}`);
    this.name = "DocumentSourceError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Maps one raw record to an ingested document, or null when unusable.
 */
export function parseDocumentRecord(record: unknown): IngestedDocument | null {
  if (!isRecord(record)) {
    return null;
  }

  const { title, description, url, source, publishedAt } = record;

  if (
    !isNonEmptyString(title) ||
    !isNonEmptyString(url) ||
    !isNonEmptyString(source)
  ) {
    return null;
  }

  return {
    document: {
      title: title.trim(),
      description: typeof description === "string" ? description.trim() : "",
      url: url.trim(),
      source: source.trim(),
    },
    publishedAt:
      typeof publishedAt === "string" ? toIsoTimestamp(publishedAt) : null,
  };
}

export class JsonFileDocumentSource implements DocumentSource {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `json:${path.basename(filePath)}`;
  }

  async fetchDocuments(): Promise<IngestedDocument[]> {
    const resolvedPath = path.resolve(process.cwd(), this.filePath);

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(resolvedPath, "utf-8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DocumentSourceError(`${resolvedPath}: ${reason}`);
    }

    if (!Array.isArray(parsed)) {
      throw new DocumentSourceError(`${resolvedPath}: expected a JSON array`);
    }

    const documents: IngestedDocument[] = [];
    parsed.forEach((record: unknown, index: number) => {
      const doc = parseDocumentRecord(record);
      if (doc) {
        documents.push(doc);
      } else {
        logger.warn("Skipping invalid document record", {
          source: this.name,
          index,
        });
      }
    });

    logger.info("Fetched documents", {
      source: this.name,
      fetched: documents.length,
      skipped: parsed.length - documents.length,
    });

    return documents;
  }
}
