/**
 * Field extractor barrel exports
 */

export { extractFields } from "./fieldExtractor";
export { extractCompanyName, cleanCompanyName } from "./companyName";
export { extractFundingAmount, normalizeAmountUnit } from "./fundingAmount";
export {
  extractFundingStage,
  extractLocation,
  extractIndustry,
  renderRuleMatch,
} from "./axisFields";
