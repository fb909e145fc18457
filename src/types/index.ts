export type * from "./logger";
export type * from "./catalog";
export type * from "./lexicalIndex";
export type * from "./ranking";
export type * from "./duration";
export type * from "./recommendation";
export type * from "./evaluation";
export type * from "./db";
export type * from "./config";
export type * from "./clients/http";
export type * from "./clients/pageText";
