/**
 * Pattern registry validation module
 *
 * Validates the registry JSON structure and enforces invariants:
 * - No duplicate IDs (rules, company-name patterns, amount patterns)
 * - Known axes, location regions and industry sectors
 * - Non-negative integer weights
 * - At least one rule per axis
 * - No stateful regex flags (g, y)
 * - Required named capture groups in extraction patterns
 *
 * Validation is fail-fast: throws on first error. Compiling the
 * regular expressions happens later, in the loader.
 */

import type {
  ExtractMode,
  ExtractionPatternRaw,
  PatternRegistryRaw,
  PatternRuleRaw,
  SignalAxis,
} from "@/types";
import {
  AMOUNT_GROUP,
  AMOUNT_UNIT_GROUP,
  COMPANY_NAME_GROUP,
  FORBIDDEN_PATTERN_FLAGS,
  INDUSTRY_SECTORS,
  LOCATION_REGIONS,
  SIGNAL_AXES,
} from "@/constants/patterns";

const EXTRACT_MODES: readonly ExtractMode[] = [
  "label",
  "match",
  "capitalizedMatch",
];

/**
 * Error thrown when pattern registry validation fails.
 */
export class PatternRegistryValidationError extends Error {
  constructor(message: string) {
    super(`Pattern registry validation failed: ${message}`);
    this.name = "PatternRegistryValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "rules[0].id")
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new PatternRegistryValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new PatternRegistryValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

function validateArray(
  value: unknown,
  fieldPath: string,
): asserts value is unknown[] {
  if (!Array.isArray(value)) {
    throw new PatternRegistryValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
  if (value.length === 0) {
    throw new PatternRegistryValidationError(`${fieldPath} cannot be empty`);
  }
}

/**
 * Weights are whole, non-negative points.
 */
function validateWeight(
  value: unknown,
  fieldPath: string,
): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new PatternRegistryValidationError(
      `${fieldPath} must be an integer, got ${String(value)}`,
    );
  }
  if (value < 0) {
    throw new PatternRegistryValidationError(
      `${fieldPath} cannot be negative, got ${value}`,
    );
  }
}

function validateFlags(value: unknown, fieldPath: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new PatternRegistryValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  for (const flag of FORBIDDEN_PATTERN_FLAGS) {
    if (value.includes(flag)) {
      throw new PatternRegistryValidationError(
        `${fieldPath} cannot contain the stateful "${flag}" flag`,
      );
    }
  }
  return value;
}

function isSignalAxis(value: string): value is SignalAxis {
  return SIGNAL_AXES.some((axis) => axis === value);
}

function isExtractMode(value: string): value is ExtractMode {
  return EXTRACT_MODES.some((mode) => mode === value);
}

/**
 * Validates the category name against the rule's axis.
 *
 * Location names must be a known region and industry names a known sector;
 * funding and stage names are free-form labels.
 */
function validateCategoryName(
  axis: SignalAxis,
  name: string,
  fieldPath: string,
): void {
  if (axis === "location" && !LOCATION_REGIONS.some((r) => r === name)) {
    throw new PatternRegistryValidationError(
      `${fieldPath} must be one of ${LOCATION_REGIONS.join(", ")}, got "${name}"`,
    );
  }
  if (axis === "industry" && !INDUSTRY_SECTORS.some((s) => s === name)) {
    throw new PatternRegistryValidationError(
      `${fieldPath} must be one of ${INDUSTRY_SECTORS.join(", ")}, got "${name}"`,
    );
  }
}

function validateRule(rule: unknown, index: number): PatternRuleRaw {
  const prefix = `rules[${index}]`;
  if (!isRecord(rule)) {
    throw new PatternRegistryValidationError(`${prefix} must be an object`);
  }

  validateNonEmptyString(rule.id, `${prefix}.id`);
  validateNonEmptyString(rule.axis, `${prefix}.axis`);
  validateNonEmptyString(rule.name, `${prefix}.name`);
  validateWeight(rule.weight, `${prefix}.weight`);
  validateNonEmptyString(rule.pattern, `${prefix}.pattern`);
  validateNonEmptyString(rule.extract, `${prefix}.extract`);
  const flags = validateFlags(rule.flags, `${prefix}.flags`);

  const axis = rule.axis;
  if (!isSignalAxis(axis)) {
    throw new PatternRegistryValidationError(
      `${prefix}.axis must be one of ${SIGNAL_AXES.join(", ")}, got "${axis}"`,
    );
  }
  const extract = rule.extract;
  if (!isExtractMode(extract)) {
    throw new PatternRegistryValidationError(
      `${prefix}.extract must be one of ${EXTRACT_MODES.join(", ")}, got "${extract}"`,
    );
  }
  validateCategoryName(axis, rule.name, `${prefix}.name`);

  return {
    id: rule.id,
    axis,
    name: rule.name,
    weight: rule.weight,
    pattern: rule.pattern,
    ...(flags !== undefined && { flags }),
    extract,
  };
}

/**
 * Validates a company-name or amount pattern, including its named groups.
 *
 * @param listName - Registry key, used in error messages
 * @param requiredGroups - Named capture groups the pattern must declare
 */
function validateExtractionPattern(
  entry: unknown,
  index: number,
  listName: string,
  requiredGroups: readonly string[],
): ExtractionPatternRaw {
  const prefix = `${listName}[${index}]`;
  if (!isRecord(entry)) {
    throw new PatternRegistryValidationError(`${prefix} must be an object`);
  }

  validateNonEmptyString(entry.id, `${prefix}.id`);
  validateNonEmptyString(entry.pattern, `${prefix}.pattern`);
  const flags = validateFlags(entry.flags, `${prefix}.flags`);

  for (const group of requiredGroups) {
    if (!entry.pattern.includes(`(?<${group}>`)) {
      throw new PatternRegistryValidationError(
        `${prefix}.pattern must declare the named group "${group}"`,
      );
    }
  }

  return {
    id: entry.id,
    pattern: entry.pattern,
    ...(flags !== undefined && { flags }),
  };
}

function checkDuplicateIds(items: { id: string }[], itemType: string): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new PatternRegistryValidationError(
        `Duplicate ${itemType} ID: "${item.id}"`,
      );
    }
    seen.add(item.id);
  }
}

/**
 * Every axis needs at least one rule, and a location region or industry
 * sector may appear only once so its priority is unambiguous.
 */
function checkAxisCoverage(rules: PatternRuleRaw[]): void {
  for (const axis of SIGNAL_AXES) {
    const axisRules = rules.filter((r) => r.axis === axis);
    if (axisRules.length === 0) {
      throw new PatternRegistryValidationError(
        `Axis "${axis}" has no rules`,
      );
    }
    if (axis === "location" || axis === "industry") {
      checkDuplicateNames(axisRules, axis);
    }
  }
}

function checkDuplicateNames(rules: PatternRuleRaw[], axis: SignalAxis): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.name)) {
      throw new PatternRegistryValidationError(
        `Axis "${axis}" declares "${rule.name}" more than once`,
      );
    }
    seen.add(rule.name);
  }
}

/**
 * Validates raw pattern registry data from JSON.
 *
 * @param raw - Parsed JSON value
 * @returns The validated registry (typed as PatternRegistryRaw)
 * @throws {PatternRegistryValidationError} On the first invalid entry
 *
 * @example
 * const raw = validatePatternRegistryRaw(JSON.parse(jsonString));
 */
export function validatePatternRegistryRaw(raw: unknown): PatternRegistryRaw {
  if (!isRecord(raw)) {
    throw new PatternRegistryValidationError("Registry must be an object");
  }

  validateNonEmptyString(raw.version, "version");
  validateArray(raw.rules, "rules");
  validateArray(raw.companyNamePatterns, "companyNamePatterns");
  validateArray(raw.amountPatterns, "amountPatterns");

  const rules = raw.rules.map((rule, index) => validateRule(rule, index));
  const companyNamePatterns = raw.companyNamePatterns.map((entry, index) =>
    validateExtractionPattern(entry, index, "companyNamePatterns", [
      COMPANY_NAME_GROUP,
    ]),
  );
  const amountPatterns = raw.amountPatterns.map((entry, index) =>
    validateExtractionPattern(entry, index, "amountPatterns", [
      AMOUNT_GROUP,
      AMOUNT_UNIT_GROUP,
    ]),
  );

  checkDuplicateIds(rules, "rule");
  checkDuplicateIds(companyNamePatterns, "company name pattern");
  checkDuplicateIds(amountPatterns, "amount pattern");
  checkAxisCoverage(rules);

  return {
    version: raw.version,
    rules,
    companyNamePatterns,
    amountPatterns,
  };
}
