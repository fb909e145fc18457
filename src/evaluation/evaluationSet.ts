/**
 * Labeled evaluation set loading
 */

import * as fs from "fs";
import * as path from "path";
import type { EvaluationCase } from "@/types";

export class EvaluationSetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Evaluation set invalid: ${message}`, options);
    this.name = "EvaluationSetError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateCase(raw: unknown, index: number): EvaluationCase {
  if (!isRecord(raw)) {
    throw new EvaluationSetError(`cases[${index}] must be an object`);
  }
  const { query, relevantAssessments } = raw;
  if (typeof query !== "string" || query.trim() === "") {
    throw new EvaluationSetError(`cases[${index}].query must be a non-empty string`);
  }
  if (
    !Array.isArray(relevantAssessments) ||
    !relevantAssessments.every((name): name is string => typeof name === "string")
  ) {
    throw new EvaluationSetError(
      `cases[${index}].relevantAssessments must be an array of strings`,
    );
  }
  return { query, relevantAssessments };
}

export function validateEvaluationSet(raw: unknown): EvaluationCase[] {
  if (!Array.isArray(raw)) {
    throw new EvaluationSetError("top level must be an array of cases");
  }
  return raw.map((entry: unknown, index) => validateCase(entry, index));
}

/**
 * @throws {EvaluationSetError} If the file is unreadable, not JSON, or malformed
 */
export function loadEvaluationSet(filePath: string): EvaluationCase[] {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new EvaluationSetError(`cannot read ${resolved}`, { cause: err });
  }
  return validateEvaluationSet(raw);
}
