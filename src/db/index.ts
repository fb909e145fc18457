/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/assessmentsRepo";
export * from "./repos/evaluationRunsRepo";
