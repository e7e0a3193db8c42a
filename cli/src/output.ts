// SPDX-License-Identifier: Apache-2.0
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  QueryError,
  QueryParseError,
  QueryTokens,
  applicableColumns,
  formatParseError,
  fromDict,
  parse,
  quote,
  toDict,
  toQueryString,
  walk,
  type QueryNode,
  type TokenSlot,
} from "@fts-query/shared";

export const OutputFormatSchema = z.enum(["ast", "dict", "query"], {
  errorMap: () => ({ message: "--output must be one of ast, dict, query" }),
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export function renderQuery(ast: QueryNode, format: OutputFormat): string {
  switch (format) {
    case "ast":
      return JSON.stringify(ast, null, 2);
    case "dict":
      return JSON.stringify(toDict(ast), null, 2);
    case "query":
      return toQueryString(ast);
  }
}

/** Read a query from its dict form, written as JSON or YAML. */
export function parseQueryDocument(text: string): QueryNode {
  const value: unknown = parseYaml(text);
  return fromDict(value);
}

/** Split `--columns` values, which may repeat or be comma-separated. */
export function parseColumnList(value: unknown): string[] {
  const parts: unknown[] = Array.isArray(value) ? value : [value];
  return parts
    .flatMap((part) => (part === undefined ? [] : String(part).split(",")))
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/** One line per phrase: its text, then the columns it is matched against. */
export function columnReport(query: string, columns: readonly string[]): string[] {
  const root = parse(query);
  const lines: string[] = [];
  for (const [, node] of walk(root)) {
    if (node.type !== "PHRASE") continue;
    const applicable = [...applicableColumns(node, root, columns)];
    lines.push(`${quote(node.text)}: ${applicable.length > 0 ? applicable.join(" ") : "(none)"}`);
  }
  return lines;
}

/** `a b>c` style arguments: `>` joins co-located tokens within one slot. */
export function encodeTokenArgs(args: readonly string[]): string {
  const slots: TokenSlot[] = args.map((arg) => (arg.includes(">") ? arg.split(">") : arg));
  return new QueryTokens(slots).encode();
}

export function describeError(err: unknown): string {
  if (err instanceof QueryParseError) return formatParseError(err);
  if (err instanceof QueryError) return `Error: ${err.message}`;
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}
