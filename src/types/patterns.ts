/**
 * Pattern registry type definitions
 *
 * The registry is the single source of truth for every regular expression
 * used to score and extract funding signals.
 *
 * Two forms exist:
 * - PatternRegistryRaw: JSON shape (deserialized from data/patterns.json)
 * - PatternRegistry: compiled, frozen form shared by scorer and extractor
 */

/**
 * Independent scoring axes. Each axis contributes at most one weighted hit.
 */
export type SignalAxis = "funding" | "stage" | "location" | "industry";

export type LocationRegion = "UK" | "EU" | "ME";

export type IndustrySector = "Fintech" | "SaaS" | "Tech";

/**
 * Which signal a rule detects. Location and industry carry the sub-signal
 * that decides their priority; stage carries the round name.
 */
export type SignalCategory =
  | { axis: "funding" }
  | { axis: "stage"; stage: string }
  | { axis: "location"; region: LocationRegion }
  | { axis: "industry"; sector: IndustrySector };

/**
 * How a rule hit renders as an extracted field value.
 *
 * - label: the category name ("Series A", "Fintech")
 * - match: the literal matched substring ("London")
 * - capitalizedMatch: matched substring, first letter upper, rest lower
 */
export type ExtractMode = "label" | "match" | "capitalizedMatch";

/**
 * Axis rule as written in the registry JSON.
 */
export type PatternRuleRaw = {
  /** Unique rule identifier (e.g., "location_uk") */
  id: string;
  axis: SignalAxis;
  /** Category name: stage label, location region or industry sector */
  name: string;
  /** Points added when this rule is the first match of its axis */
  weight: number;
  /** Regular expression source (no delimiters) */
  pattern: string;
  /** Regular expression flags, defaults to "i" */
  flags?: string;
  extract: ExtractMode;
};

/**
 * Company-name or amount pattern as written in the registry JSON.
 * Capture groups are named (`name`, or `amount` + `unit`).
 */
export type ExtractionPatternRaw = {
  id: string;
  pattern: string;
  /** Regular expression flags, defaults to "i" */
  flags?: string;
};

export type PatternRegistryRaw = {
  /** Registry version (semantic versioning) */
  version: string;
  /** Axis rules; order within an axis is the priority order */
  rules: PatternRuleRaw[];
  /** Title patterns tried in order for the company name */
  companyNamePatterns: ExtractionPatternRaw[];
  /** Amount patterns tried in order (symbol-prefixed, then spelled-out) */
  amountPatterns: ExtractionPatternRaw[];
};

/**
 * Compiled axis rule.
 */
export type PatternRule = {
  readonly id: string;
  readonly category: SignalCategory;
  /** Category name, used when extract is "label" */
  readonly label: string;
  readonly weight: number;
  readonly pattern: RegExp;
  readonly extract: ExtractMode;
};

export type ExtractionPattern = {
  readonly id: string;
  readonly pattern: RegExp;
};

/**
 * Compiled registry. Frozen at construction; never mutated afterwards.
 */
export type PatternRegistry = {
  readonly version: string;
  /** Rules per axis, in priority order */
  readonly axes: Readonly<Record<SignalAxis, readonly PatternRule[]>>;
  readonly companyNamePatterns: readonly ExtractionPattern[];
  readonly amountPatterns: readonly ExtractionPattern[];
};

/**
 * First rule of an axis that matched a text, with its match.
 */
export type RuleMatch = {
  rule: PatternRule;
  /** The literal matched substring */
  matched: string;
};
