// SPDX-License-Identifier: Apache-2.0
import {
  QueryError,
  QueryParseError,
  fromDict,
  parse,
  toDict,
  toQueryString,
  type QueryNode,
} from "@fts-query/shared";
import type { ConformanceCase } from "./loader";

export interface AssertionFailure {
  assertion: string;
  expected: string;
  actual: string;
}

export interface CaseResult {
  name: string;
  query: string;
  passed: boolean;
  failures: AssertionFailure[];
  canonical?: string;
}

// Dict form with markers encoded, so QueryTokens compare by value.
function fingerprint(node: QueryNode): string {
  return JSON.stringify(toDict(node));
}

function failureMessage(err: unknown): string {
  if (err instanceof QueryParseError) return `${err.message} at ${err.position}`;
  if (err instanceof QueryError) return err.message;
  throw err;
}

function checkParsed(tc: ConformanceCase, ast: QueryNode, failures: AssertionFailure[]): string {
  const canonical = toQueryString(ast);

  if (tc.canonical !== undefined && canonical !== tc.canonical) {
    failures.push({ assertion: "canonical", expected: tc.canonical, actual: canonical });
  }

  try {
    const reparsed = parse(canonical);
    if (fingerprint(reparsed) !== fingerprint(ast)) {
      failures.push({ assertion: "round_trip_text", expected: fingerprint(ast), actual: fingerprint(reparsed) });
    }
    const again = toQueryString(reparsed);
    if (again !== canonical) {
      failures.push({ assertion: "idempotent", expected: canonical, actual: again });
    }
  } catch (err) {
    failures.push({ assertion: "round_trip_text", expected: "canonical text to parse", actual: failureMessage(err) });
  }

  try {
    const decoded = fromDict(toDict(ast));
    if (fingerprint(decoded) !== fingerprint(ast)) {
      failures.push({ assertion: "round_trip_dict", expected: fingerprint(ast), actual: fingerprint(decoded) });
    }
  } catch (err) {
    failures.push({ assertion: "round_trip_dict", expected: "dict to decode", actual: failureMessage(err) });
  }

  if (tc.dict !== undefined) {
    try {
      const expected = fromDict(tc.dict);
      if (fingerprint(expected) !== fingerprint(ast)) {
        failures.push({ assertion: "dict", expected: fingerprint(expected), actual: fingerprint(ast) });
      }
    } catch (err) {
      failures.push({ assertion: "dict", expected: "a valid dict", actual: failureMessage(err) });
    }
  }

  return canonical;
}

export function runCase(tc: ConformanceCase): CaseResult {
  const failures: AssertionFailure[] = [];
  let canonical: string | undefined;

  let ast: QueryNode | null = null;
  try {
    ast = parse(tc.query);
  } catch (err) {
    if (!(err instanceof QueryParseError)) throw err;
    if (tc.error_position === undefined) {
      failures.push({ assertion: "parse", expected: "query to parse", actual: failureMessage(err) });
    } else if (err.position !== tc.error_position) {
      failures.push({
        assertion: "error_position",
        expected: `${tc.error_position}`,
        actual: `${err.position} (${err.message})`,
      });
    }
  }

  if (ast) {
    if (tc.error_position !== undefined) {
      failures.push({
        assertion: "error_position",
        expected: `error at ${tc.error_position}`,
        actual: "parsed",
      });
    } else {
      canonical = checkParsed(tc, ast, failures);
    }
  }

  return {
    name: tc.name,
    query: tc.query,
    passed: failures.length === 0,
    failures,
    canonical,
  };
}
