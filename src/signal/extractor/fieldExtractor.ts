/**
 * Field extractor — best-effort structured fields from a text blob
 *
 * Each field is extracted independently of the others and of the score.
 * Absence always resolves to UNKNOWN_FIELD; nothing here throws.
 */

import type { ExtractedFields, PatternRegistry } from "@/types";
import { extractCompanyName } from "./companyName";
import { extractFundingAmount } from "./fundingAmount";
import {
  extractFundingStage,
  extractIndustry,
  extractLocation,
} from "./axisFields";

/**
 * Extracts all five fields.
 *
 * @param text - Title and description joined
 * @param title - Title alone, used for the company name
 * @param registry - Compiled pattern registry
 */
export function extractFields(
  text: string,
  title: string,
  registry: PatternRegistry,
): ExtractedFields {
  return {
    companyName: extractCompanyName(title, registry),
    fundingStage: extractFundingStage(text, registry),
    fundingAmount: extractFundingAmount(text, registry),
    location: extractLocation(text, registry),
    industry: extractIndustry(text, registry),
  };
}
