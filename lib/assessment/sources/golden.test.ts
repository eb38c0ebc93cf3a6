import { describe, expect, it } from "vitest";
import { runGoldenCase, validateGoldenCase, type GoldenSuite } from "../testing/golden";
import { ACCEO_FIELDS } from "./acceo/constants";
import { acceoGoldenCases } from "./acceo/golden/cases";
import { MONTREAL_FIELDS } from "./montreal/constants";
import { montrealGoldenCases } from "./montreal/golden/cases";

const suites: GoldenSuite[] = [
  {
    name: "Montréal",
    baseUrl: new URL("./montreal/golden/", import.meta.url).toString(),
    fields: MONTREAL_FIELDS,
    cases: montrealGoldenCases,
  },
  {
    name: "Acceo",
    baseUrl: new URL("./acceo/golden/", import.meta.url).toString(),
    fields: ACCEO_FIELDS,
    cases: acceoGoldenCases,
  },
];

describe.each(suites)("$name golden pages", (suite) => {
  it.each(suite.cases)("$name ($id)", (testCase) => {
    const extracted = runGoldenCase(suite, testCase);
    expect(validateGoldenCase(extracted, testCase.expect).failures).toEqual([]);
  });
});
