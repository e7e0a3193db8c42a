// SPDX-License-Identifier: Apache-2.0
import { fileURLToPath } from "node:url";
import { log } from "../log";
import { runCase } from "./check";
import { loadAllSuites } from "./loader";
import { reportResults, type SuiteSummary } from "./reporter";

export const SUITES_DIR = fileURLToPath(new URL("../../suites", import.meta.url));

/** Run every suite in `suitesDir`; true when all cases pass. */
export function runConformance(options: { suites: string; verbose: boolean }): boolean {
  const suites = loadAllSuites(options.suites);
  log(`Loaded ${suites.length} suites from ${options.suites}`, options.verbose);

  const summaries: SuiteSummary[] = suites.map((suite) => ({
    file: suite.file,
    results: suite.cases.map(runCase),
  }));

  return reportResults(summaries, options.verbose);
}
