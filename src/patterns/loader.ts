/**
 * Pattern registry loading and compilation
 *
 * Loads the registry JSON, validates it, and compiles it into the frozen
 * runtime structure shared by the scorer and the field extractor.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  ExtractionPattern,
  ExtractionPatternRaw,
  PatternRegistry,
  PatternRegistryRaw,
  PatternRule,
  PatternRuleRaw,
  SignalAxis,
  SignalCategory,
} from "@/types";
import { validatePatternRegistryRaw } from "@/utils/patternValidation";
import { DEFAULT_PATTERN_FLAGS, PATTERNS_PATH } from "@/constants/patterns";
import * as logger from "@/logger";

/**
 * Error thrown when a registry pattern fails to compile.
 */
export class PatternCompilationError extends Error {
  constructor(message: string) {
    super(`Pattern compilation failed: ${message}`);
    this.name = "PatternCompilationError";
  }
}

function compileRegExp(id: string, source: string, flags?: string): RegExp {
  try {
    return new RegExp(source, flags ?? DEFAULT_PATTERN_FLAGS);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PatternCompilationError(`"${id}": ${reason}`);
  }
}

/**
 * Builds the tagged category for a validated rule. Region and sector
 * names were checked against their unions during validation.
 */
function toCategory(rule: PatternRuleRaw): SignalCategory {
  switch (rule.axis) {
    case "funding":
      return { axis: "funding" };
    case "stage":
      return { axis: "stage", stage: rule.name };
    case "location":
      if (rule.name === "UK" || rule.name === "EU" || rule.name === "ME") {
        return { axis: "location", region: rule.name };
      }
      break;
    case "industry":
      if (
        rule.name === "Fintech" ||
        rule.name === "SaaS" ||
        rule.name === "Tech"
      ) {
        return { axis: "industry", sector: rule.name };
      }
      break;
  }
  throw new PatternCompilationError(
    `"${rule.id}": unknown ${rule.axis} category "${rule.name}"`,
  );
}

function compileRule(rule: PatternRuleRaw): PatternRule {
  return Object.freeze({
    id: rule.id,
    category: Object.freeze(toCategory(rule)),
    label: rule.name,
    weight: rule.weight,
    pattern: compileRegExp(rule.id, rule.pattern, rule.flags),
    extract: rule.extract,
  });
}

function compileExtractionPattern(
  entry: ExtractionPatternRaw,
): ExtractionPattern {
  return Object.freeze({
    id: entry.id,
    pattern: compileRegExp(entry.id, entry.pattern, entry.flags),
  });
}

/**
 * Compiles a validated raw registry into its frozen runtime form.
 *
 * Rule order within each axis is preserved: it is the priority order.
 *
 * @throws {PatternCompilationError} If any pattern fails to compile
 */
function compileValidated(raw: PatternRegistryRaw): PatternRegistry {
  const axes: Record<SignalAxis, PatternRule[]> = {
    funding: [],
    stage: [],
    location: [],
    industry: [],
  };

  for (const rule of raw.rules) {
    axes[rule.axis].push(compileRule(rule));
  }

  return Object.freeze({
    version: raw.version,
    axes: Object.freeze({
      funding: Object.freeze(axes.funding),
      stage: Object.freeze(axes.stage),
      location: Object.freeze(axes.location),
      industry: Object.freeze(axes.industry),
    }),
    companyNamePatterns: Object.freeze(
      raw.companyNamePatterns.map(compileExtractionPattern),
    ),
    amountPatterns: Object.freeze(
      raw.amountPatterns.map(compileExtractionPattern),
    ),
  });
}

/**
 * Validates and compiles a registry from an already-parsed value.
 *
 * Tests use this to build alternate registries without touching disk.
 *
 * @throws {PatternRegistryValidationError} If validation fails
 * @throws {PatternCompilationError} If compilation fails
 */
export function compilePatternRegistry(raw: unknown): PatternRegistry {
  return compileValidated(validatePatternRegistryRaw(raw));
}

/**
 * Loads and compiles the pattern registry.
 *
 * Fail-fast: any read, parse, validation or compilation error throws,
 * and the process must not start.
 *
 * @param registryPath - Path to the registry JSON, relative to cwd
 * @throws {Error} If file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {PatternRegistryValidationError} If validation fails
 * @throws {PatternCompilationError} If compilation fails
 *
 * @example
 * const registry = loadPatternRegistry();
 * console.log(`Loaded ${registry.axes.location.length} location rules`);
 */
export function loadPatternRegistry(
  registryPath: string = PATTERNS_PATH,
): PatternRegistry {
  const resolvedPath = path.resolve(process.cwd(), registryPath);
  const jsonContent = fs.readFileSync(resolvedPath, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  const registry = compilePatternRegistry(raw);

  logger.debug("Pattern registry loaded", {
    path: resolvedPath,
    version: registry.version,
  });

  return registry;
}
