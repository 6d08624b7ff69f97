/**
 * Logger barrel exports
 */

export * from "./logger";
