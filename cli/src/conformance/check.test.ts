// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { runCase } from "./check";
import { loadAllSuites } from "./loader";
import { SUITES_DIR } from "./run";

describe("runCase", () => {
  test("passes a matching canonical form", () => {
    const result = runCase({ name: "seq", query: "one+two", canonical: "one +two" });
    expect(result.passed).toBe(true);
    expect(result.canonical).toBe("one +two");
  });

  test("reports a different canonical form", () => {
    const result = runCase({ name: "seq", query: "one+two", canonical: "one two" });
    expect(result.passed).toBe(false);
    expect(result.failures).toEqual([{ assertion: "canonical", expected: "one two", actual: "one +two" }]);
  });

  test("passes an expected error position", () => {
    const result = runCase({ name: "err", query: "one AND", error_position: 7 });
    expect(result.passed).toBe(true);
    expect(result.canonical).toBeUndefined();
  });

  test("reports a different error position", () => {
    const result = runCase({ name: "err", query: "one AND", error_position: 3 });
    expect(result.failures).toEqual([
      { assertion: "error_position", expected: "3", actual: "7 (Expected a search term)" },
    ]);
  });

  test("reports a query that parses when an error was expected", () => {
    const result = runCase({ name: "err", query: "a", error_position: 0 });
    expect(result.failures).toEqual([{ assertion: "error_position", expected: "error at 0", actual: "parsed" }]);
  });

  test("reports an unexpected parse error", () => {
    const result = runCase({ name: "bad", query: "one &" });
    expect(result.failures).toEqual([
      { assertion: "parse", expected: "query to parse", actual: "Invalid query character '&' at 4" },
    ]);
  });

  test("compares the expected dict by value", () => {
    expect(runCase({ name: "d", query: "a b", dict: ["a", "b"] }).passed).toBe(true);
    const result = runCase({ name: "d", query: "a b", dict: { "@": "AND", queries: ["a", "b"] } });
    expect(result.failures.map((f) => f.assertion)).toEqual(["dict"]);
  });

  test("reports an invalid expected dict", () => {
    const result = runCase({ name: "d", query: "a", dict: { "@": "NEAR", phrases: ["a"] } });
    expect(result.failures).toEqual([
      { assertion: "dict", expected: "a valid dict", actual: "NEAR needs at least two phrases" },
    ]);
  });
});

describe("bundled suites", () => {
  const suites = loadAllSuites(SUITES_DIR);

  test("are all found", () => {
    expect(suites.map((s) => s.file)).toEqual([
      "column-filters.yaml",
      "errors.yaml",
      "near.yaml",
      "operators.yaml",
      "phrases.yaml",
    ]);
  });

  for (const suite of suites) {
    for (const tc of suite.cases) {
      test(`${suite.file}: ${tc.name}`, () => {
        expect(runCase(tc).failures).toEqual([]);
      });
    }
  }
});
