#!/usr/bin/env tsx
/**
 * Golden Extraction Runner
 *
 * Runs each dialect's field table over its saved detail pages and reports
 * fields that drifted from the expected values.
 * Run with: npm run golden
 */

import { ACCEO_FIELDS } from "../lib/assessment/sources/acceo/constants";
import { acceoGoldenCases } from "../lib/assessment/sources/acceo/golden/cases";
import { MONTREAL_FIELDS } from "../lib/assessment/sources/montreal/constants";
import { montrealGoldenCases } from "../lib/assessment/sources/montreal/golden/cases";
import {
  runGoldenCase,
  validateGoldenCase,
  type GoldenExtractionCase,
  type GoldenSuite,
} from "../lib/assessment/testing/golden";

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

const suites: GoldenSuite[] = [
  {
    name: "Montréal",
    baseUrl: new URL("../lib/assessment/sources/montreal/golden/", import.meta.url).toString(),
    fields: MONTREAL_FIELDS,
    cases: montrealGoldenCases,
  },
  {
    name: "Acceo",
    baseUrl: new URL("../lib/assessment/sources/acceo/golden/", import.meta.url).toString(),
    fields: ACCEO_FIELDS,
    cases: acceoGoldenCases,
  },
];

function runGoldenTests(): void {
  console.log(`\n${colors.blue}=== Field Extraction Golden Tests ===${colors.reset}\n`);

  let totalPassed = 0;
  let totalFailed = 0;
  const allFailures: Array<{ suite: string; case: GoldenExtractionCase; errors: string[] }> = [];

  for (const suite of suites) {
    console.log(`\n${colors.blue}--- ${suite.name} ---${colors.reset}\n`);

    for (const testCase of suite.cases) {
      console.log(`${colors.dim}Testing: ${testCase.name} (${testCase.id})${colors.reset}`);

      let errors: string[];
      try {
        errors = validateGoldenCase(runGoldenCase(suite, testCase), testCase.expect).failures;
      } catch (error) {
        errors = [error instanceof Error ? error.message : String(error)];
      }

      if (errors.length === 0) {
        console.log(`  ${colors.green}✓ PASSED${colors.reset}`);
        totalPassed++;
      } else {
        console.log(`  ${colors.red}✗ FAILED${colors.reset}`);
        errors.forEach((e) => console.log(`    ${colors.red}- ${e}${colors.reset}`));
        totalFailed++;
        allFailures.push({ suite: suite.name, case: testCase, errors });
      }
    }
  }

  console.log(`\n${colors.blue}=== Overall Summary ===${colors.reset}`);
  console.log(`  Total: ${totalPassed + totalFailed}`);
  console.log(`  ${colors.green}Passed: ${totalPassed}${colors.reset}`);
  console.log(`  ${colors.red}Failed: ${totalFailed}${colors.reset}`);

  if (allFailures.length > 0) {
    console.log(`\n${colors.yellow}=== Failure Details ===${colors.reset}`);
    for (const failure of allFailures) {
      console.log(`\n  [${failure.suite}] ${failure.case.name} (${failure.case.id}):`);
      failure.errors.forEach((e) => console.log(`    - ${e}`));
    }
    process.exit(1);
  }

  console.log(`\n${colors.green}All golden tests passed!${colors.reset}\n`);
}

runGoldenTests();
