/**
 * Unit tests for field extraction
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  cleanCompanyName,
  extractCompanyName,
  extractFields,
  extractFundingAmount,
  extractFundingStage,
  extractIndustry,
  extractLocation,
  normalizeAmountUnit,
} from "@/signal/extractor";
import { UNKNOWN_FIELD } from "@/constants/classification";
import { loadTestRegistry } from "../helpers/registry";

const registry = loadTestRegistry();

describe("extractCompanyName", () => {
  it("should take the name before a funding verb", () => {
    expect(extractCompanyName("Acme raises $10M Series A", registry)).toBe(
      "Acme",
    );
  });

  it("should fall back to the appositive pattern", () => {
    const title = "Acme Corp, a London fintech, raises $5M";

    expect(registry.companyNamePatterns[0].pattern.test(title)).toBe(false);
    expect(extractCompanyName(title, registry)).toBe("Acme Corp");
  });

  it("should prefer the verb pattern over the appositive pattern", () => {
    const title = "Acme raises funds, a first for Leeds";

    expect(
      registry.companyNamePatterns[1].pattern.exec(title)?.groups?.name,
    ).toBe("Acme raises funds");
    expect(extractCompanyName(title, registry)).toBe("Acme");
  });

  it("should find a name before 'has raised' anywhere in the title", () => {
    expect(
      extractCompanyName("Funding news: Initech has raised $2M", registry),
    ).toBe("Initech");
  });

  it("should trim trailing punctuation and collapse whitespace", () => {
    expect(extractCompanyName("Acme   Labs. raises $1M", registry)).toBe(
      "Acme Labs",
    );
  });

  it("should return the sentinel when no pattern matches", () => {
    expect(
      extractCompanyName("Weekly roundup of startup news", registry),
    ).toBe(UNKNOWN_FIELD);
    expect(extractCompanyName("acme raises $5M", registry)).toBe(
      UNKNOWN_FIELD,
    );
  });
});

describe("cleanCompanyName", () => {
  it("should clean surrounding noise", () => {
    expect(cleanCompanyName("  Acme  Corp;: ")).toBe("Acme Corp");
  });
});

describe("extractFundingAmount", () => {
  it.each([
    ["Acme raised $10M", "$10M"],
    ["raised €20 million", "$20M"],
    ["raised 5 million dollars", "$5M"],
    ["a £5m round", "$5M"],
    ["valued at $1.5B", "$1.5B"],
    ["valued at $3 billion", "$3B"],
    ["a $250k grant", "$250K"],
    ["£5 million pounds", "$5M"],
  ])("should normalize %s to %s", (text, expected) => {
    expect(extractFundingAmount(text, registry)).toBe(expected);
  });

  it("should return the sentinel when no amount is present", () => {
    expect(extractFundingAmount("no figures disclosed", registry)).toBe(
      UNKNOWN_FIELD,
    );
    expect(extractFundingAmount("costs $10 per month", registry)).toBe(
      UNKNOWN_FIELD,
    );
  });
});

describe("normalizeAmountUnit", () => {
  it("should map the leading character to a scale letter", () => {
    expect(normalizeAmountUnit("Million")).toBe("M");
    expect(normalizeAmountUnit("k")).toBe("K");
    expect(normalizeAmountUnit("B")).toBe("B");
  });
});

describe("extractFundingStage", () => {
  it("should return the stage label", () => {
    expect(extractFundingStage("closed a Series B round", registry)).toBe(
      "Series B",
    );
    expect(extractFundingStage("a pre-seed cheque", registry)).toBe("Seed");
  });

  it("should follow registry order", () => {
    expect(
      extractFundingStage("Series A after a seed round", registry),
    ).toBe("Seed");
  });

  it("should return the sentinel for unknown stages", () => {
    expect(extractFundingStage("Series D extension", registry)).toBe(
      UNKNOWN_FIELD,
    );
  });
});

describe("extractLocation", () => {
  it("should return the literal matched substring", () => {
    expect(extractLocation("based in London", registry)).toBe("London");
    expect(extractLocation("based in LONDON", registry)).toBe("LONDON");
    expect(extractLocation("a Tel Aviv startup", registry)).toBe("Tel Aviv");
  });

  it("should prefer UK over EU", () => {
    expect(extractLocation("Berlin and London", registry)).toBe("London");
  });

  it("should return the sentinel, never an empty string", () => {
    expect(extractLocation("based in Toronto", registry)).toBe(UNKNOWN_FIELD);
  });
});

describe("extractIndustry", () => {
  it("should label fintech and SaaS", () => {
    expect(extractIndustry("a fintech and SaaS company", registry)).toBe(
      "Fintech",
    );
    expect(extractIndustry("SaaS platform", registry)).toBe("SaaS");
  });

  it("should capitalize generic tech matches", () => {
    expect(extractIndustry("machine learning startup", registry)).toBe(
      "Machine learning",
    );
    expect(extractIndustry("an AI lab", registry)).toBe("Ai");
    expect(extractIndustry("a proptech firm", registry)).toBe("Proptech");
  });

  it("should return the sentinel when no industry matches", () => {
    expect(extractIndustry("a bakery", registry)).toBe(UNKNOWN_FIELD);
  });
});

describe("extractFields", () => {
  it("should fill every field with the sentinel when nothing matches", () => {
    expect(extractFields("nothing here", "nothing here", registry)).toEqual({
      companyName: UNKNOWN_FIELD,
      fundingStage: UNKNOWN_FIELD,
      fundingAmount: UNKNOWN_FIELD,
      location: UNKNOWN_FIELD,
      industry: UNKNOWN_FIELD,
    });
  });

  it("should read the company name from the title only", () => {
    const fields = extractFields(
      "Weekly news. Acme raises $3M in Paris",
      "Weekly news",
      registry,
    );

    expect(fields).toEqual({
      companyName: UNKNOWN_FIELD,
      fundingStage: UNKNOWN_FIELD,
      fundingAmount: "$3M",
      location: "Paris",
      industry: UNKNOWN_FIELD,
    });
  });
});
