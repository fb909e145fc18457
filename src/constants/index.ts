/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./catalog";
export * from "./textNormalization";
export * from "./lexicalIndex";
export * from "./duration";
export * from "./recommendation";
export * from "./evaluation";
export * from "./clients/http";
export * from "./clients/pageText";
