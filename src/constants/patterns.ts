/**
 * Pattern registry constants
 */

import type { IndustrySector, LocationRegion, SignalAxis } from "@/types";

/**
 * Path to the pattern registry JSON file, relative to the project root.
 */
export const PATTERNS_PATH = "data/patterns.json";

/**
 * Axis evaluation order used by the scorer and reported in score reasons.
 */
export const SIGNAL_AXES: readonly SignalAxis[] = [
  "funding",
  "stage",
  "location",
  "industry",
];

export const LOCATION_REGIONS: readonly LocationRegion[] = ["UK", "EU", "ME"];

export const INDUSTRY_SECTORS: readonly IndustrySector[] = [
  "Fintech",
  "SaaS",
  "Tech",
];

/**
 * Flags applied when a registry entry does not declare its own.
 */
export const DEFAULT_PATTERN_FLAGS = "i";

/**
 * Flags that make RegExp#exec stateful (lastIndex) and are rejected.
 */
export const FORBIDDEN_PATTERN_FLAGS = ["g", "y"] as const;

/**
 * Named capture groups each extraction pattern family must declare.
 */
export const COMPANY_NAME_GROUP = "name";
export const AMOUNT_GROUP = "amount";
export const AMOUNT_UNIT_GROUP = "unit";
