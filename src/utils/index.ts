/**
 * Utils barrel exports
 */

export * from "./text/textCleanup";
export * from "./dates";
export * from "./patternValidation";
