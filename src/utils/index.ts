/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./text/removeDiacritics";
export * from "./text/htmlText";
export * from "./text/stopWords";
export * from "./catalogValidation";
