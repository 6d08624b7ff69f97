/**
 * Constants barrel exports
 */

export * from "./patterns";
export * from "./scoring";
export * from "./classification";
export * from "./digest";
export * from "./runner";
