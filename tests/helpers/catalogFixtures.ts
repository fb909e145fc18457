/**
 * Small hand-written catalogs shared by unit tests
 */

import type { CatalogItem } from "@/types";

function item(
  name: string,
  duration: string,
  test_type: string,
  description?: string,
): CatalogItem {
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, "-");
  const base: CatalogItem = {
    name,
    url: `https://catalog.example.com/assessments/${slug}/`,
    remote_testing: "Yes",
    adaptive_support: "No",
    duration,
    test_type,
  };
  return description === undefined ? base : { ...base, description };
}

/**
 * Six items; index 5 is untimed (duration parses to 0)
 */
export function createTestCatalog(): CatalogItem[] {
  return [
    item(
      "Core Java (Entry Level)",
      "35 minutes",
      "Knowledge & Skills",
      "Multiple-choice test of core Java programming concepts for entry level developers.",
    ),
    item(
      "Core Java (Advanced Level)",
      "60 minutes",
      "Knowledge & Skills",
      "Advanced Java programming covering concurrency, collections and JVM internals.",
    ),
    item(
      "Python (New)",
      "30 minutes",
      "Knowledge & Skills",
      "Measures knowledge of Python programming, data structures and libraries.",
    ),
    item(
      "Sales Representative Solution",
      "45 minutes",
      "Personality & Behavior",
      "Assesses sales aptitude, customer focus and persuasion for sales roles.",
    ),
    item(
      "Verify Numerical Reasoning",
      "18 minutes",
      "Ability & Aptitude",
      "Measures the ability to interpret numerical data in charts and tables.",
    ),
    item(
      "Occupational Personality Questionnaire",
      "Untimed",
      "Personality & Behavior",
    ),
  ];
}
