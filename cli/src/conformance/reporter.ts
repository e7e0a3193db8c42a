// SPDX-License-Identifier: Apache-2.0
import type { CaseResult } from "./check";

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

function statusIcon(passed: boolean): string {
  return passed ? `${GREEN}✓${RESET}` : `${RED}✗${RESET}`;
}

export interface SuiteSummary {
  file: string;
  results: CaseResult[];
}

export function reportResults(suites: SuiteSummary[], verbose: boolean): boolean {
  let totalPassed = 0;
  let totalFailed = 0;

  for (const suite of suites) {
    process.stderr.write(`\n${DIM}── ${suite.file} ──${RESET}\n`);

    for (const r of suite.results) {
      process.stderr.write(`  ${statusIcon(r.passed)} ${r.name}\n`);
      process.stderr.write(`    ${DIM}query: ${r.query}${RESET}\n`);

      if (verbose && r.canonical !== undefined) {
        process.stderr.write(`    ${DIM}canonical: ${r.canonical}${RESET}\n`);
      }

      if (!r.passed) {
        for (const f of r.failures) {
          process.stderr.write(`    ${RED}${f.assertion}: expected ${f.expected}, got ${f.actual}${RESET}\n`);
        }
      }

      if (r.passed) totalPassed++;
      else totalFailed++;
    }
  }

  process.stderr.write("\n");

  const parts: string[] = [];
  parts.push(`${GREEN}${totalPassed} passed${RESET}`);
  if (totalFailed > 0) parts.push(`${RED}${totalFailed} failed${RESET}`);
  process.stderr.write(`${parts.join(", ")}\n`);

  return totalFailed === 0;
}
