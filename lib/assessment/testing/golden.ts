/**
 * Golden Extraction Cases
 *
 * Saved detail pages paired with the fields their dialect's spec table
 * must extract from them.
 */

import { extractAll } from "../extraction/field-extractor";
import type { FieldSpecTable } from "../extraction/field-spec";
import { createSnapshot } from "../extraction/page-text";
import { EXTRACTED_FIELDS, type InternalFields } from "../types";
import { readFixture } from "./fixture-site";

export interface GoldenExtractionCase {
  id: string;
  name: string;
  /** Relative to the golden directory of the source. */
  fixturePath: string;
  /** Every extracted field; omitted fields must come back empty. */
  expect: InternalFields;
}

export interface GoldenSuite {
  name: string;
  /** `import.meta.url` of the module owning the fixtures directory. */
  baseUrl: string;
  fields: FieldSpecTable;
  cases: GoldenExtractionCase[];
}

export function runGoldenCase(suite: GoldenSuite, testCase: GoldenExtractionCase): InternalFields {
  const html = readFixture(suite.baseUrl, testCase.fixturePath);
  return extractAll(createSnapshot(html), suite.fields);
}

/**
 * Compare extracted fields against expected values.
 */
export function validateGoldenCase(
  extracted: InternalFields,
  expected: InternalFields
): { passed: boolean; failures: string[] } {
  const failures: string[] = [];

  for (const name of EXTRACTED_FIELDS) {
    const want = expected[name] ?? "";
    const got = extracted[name] ?? "";
    if (want !== got) {
      failures.push(`${name}: expected "${want}", got "${got}"`);
    }
  }

  return { passed: failures.length === 0, failures };
}
