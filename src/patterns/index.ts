/**
 * Pattern registry barrel exports
 */

export {
  loadPatternRegistry,
  compilePatternRegistry,
  PatternCompilationError,
} from "./loader";

export { rulesForAxis, findFirstMatch, findFirstPatternMatch } from "./registry";
