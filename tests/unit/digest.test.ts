/**
 * Unit tests for digest rendering
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  formatDigestDate,
  formatFileTimestamp,
  renderDigest,
  renderDigestSubject,
} from "@/digest";
import { DIGEST_RULE } from "@/constants/digest";
import type { DigestEntry } from "@/types";

const NOW = new Date("2026-03-05T09:30:15.123Z");

function createEntry(overrides: Partial<DigestEntry> = {}): DigestEntry {
  return {
    company_name: "Acme",
    funding_stage: "Series A",
    funding_amount: "$10M",
    location: "London",
    industry: "Fintech",
    description: "Payments startup.",
    url: "https://example.com/acme",
    ...overrides,
  };
}

describe("renderDigestSubject", () => {
  it("should render the daily subject", () => {
    expect(renderDigestSubject(3, "daily", NOW)).toBe(
      "Daily Funding Digest - 3 New Opportunities - 2026-03-05",
    );
  });

  it("should render the weekly subject", () => {
    expect(renderDigestSubject(2, "weekly", NOW)).toBe(
      "Weekly Funding Digest - 2 New Opportunities - Week of 2026-03-05",
    );
  });
});

describe("renderDigest", () => {
  it("should render every entry field", () => {
    const digest = renderDigest([createEntry()], "daily", NOW);

    expect(digest.digestType).toBe("daily");
    expect(digest.count).toBe(1);
    expect(digest.subject).toBe(
      "Daily Funding Digest - 1 New Opportunities - 2026-03-05",
    );
    expect(digest.body.split("\n")).toEqual([
      "Funding Digest - 2026-03-05",
      DIGEST_RULE,
      "",
      "1 new funding announcement(s) in the last 1 day(s)",
      "Geographic Focus: UK, Europe & Middle East",
      "Stages: Seed to Series C | Priority: Fintech & SaaS",
      "",
      DIGEST_RULE,
      "",
      "1. Acme",
      "   Stage: Series A",
      "   Amount: $10M",
      "   Location: London",
      "   Industry: Fintech",
      "   Description: Payments startup.",
      "   Read more: https://example.com/acme",
      "",
      DIGEST_RULE,
      "Generated on 2026-03-05 09:30 UTC",
    ]);
  });

  it("should number entries in order", () => {
    const digest = renderDigest(
      [createEntry(), createEntry({ company_name: "Initech" })],
      "weekly",
      NOW,
    );
    const lines = digest.body.split("\n");

    expect(lines[3]).toBe("2 new funding announcement(s) in the last 7 day(s)");
    expect(lines).toContain("1. Acme");
    expect(lines).toContain("2. Initech");
  });

  it("should cut long descriptions at 200 characters", () => {
    const digest = renderDigest(
      [createEntry({ description: "x".repeat(250) })],
      "daily",
      NOW,
    );

    expect(digest.body.split("\n")).toContain(
      `   Description: ${"x".repeat(200)}...`,
    );
  });

  it("should keep a description of exactly 200 characters whole", () => {
    const digest = renderDigest(
      [createEntry({ description: "y".repeat(200) })],
      "daily",
      NOW,
    );

    expect(digest.body.split("\n")).toContain(
      `   Description: ${"y".repeat(200)}`,
    );
  });

  it("should render an empty digest", () => {
    const digest = renderDigest([], "daily", NOW);

    expect(digest.count).toBe(0);
    expect(digest.body.split("\n").slice(3, 4)).toEqual([
      "0 new funding announcement(s) in the last 1 day(s)",
    ]);
    expect(digest.body.split("\n").slice(9)).toEqual([
      "No new funding announcements matching your criteria were found in this period.",
      "",
      DIGEST_RULE,
      "Generated on 2026-03-05 09:30 UTC",
    ]);
  });
});

describe("date formatting", () => {
  it("should format dates in UTC", () => {
    expect(formatDigestDate(new Date("2026-12-31T23:59:59.000Z"))).toBe(
      "2026-12-31",
    );
  });

  it("should format filesystem-safe timestamps", () => {
    expect(formatFileTimestamp(NOW)).toBe("2026-03-05_09-30-15");
  });
});
