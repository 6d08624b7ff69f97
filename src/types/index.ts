export * from "./patterns";
export * from "./documents";
export * from "./scoring";
export * from "./classification";
export * from "./db";
export * from "./digest";
export * from "./config";
export * from "./runner";
