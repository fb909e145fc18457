/**
 * Retrieval barrel exports
 */

export * from "./lexicalIndex";
export * from "./ranker";
export * from "./constraints";
