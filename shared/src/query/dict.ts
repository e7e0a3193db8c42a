// SPDX-License-Identifier: Apache-2.0
import { z } from "zod";
import {
  DEFAULT_NEAR_DISTANCE,
  MAX_QUERY_DEPTH,
  type ColumnFilterMode,
  type PhraseNode,
  type PhraseText,
  type QueryNode,
} from "./ast";
import { QueryValidationError } from "./errors";
import { and, columnFilter, near, not, or, phrase, phrases } from "./nodes";
import { QueryTokens } from "./query-tokens";

// --- Dict shapes produced by toDict ---
//
// "@" names the node type. Fields holding their default value are left out.

export interface PhraseDict {
  "@": "PHRASE";
  text: PhraseText;
  initial?: boolean;
  prefix?: boolean;
  sequence?: boolean;
}

export interface PhrasesDict {
  "@": "PHRASES";
  phrases: PhraseDict[];
}

export interface NearDict {
  "@": "NEAR";
  phrases: PhraseDict[];
  distance?: number;
}

export interface ColumnFilterDict {
  "@": "COLUMNFILTER";
  columns: string[];
  filter?: ColumnFilterMode;
  query: QueryDict;
}

export interface AndDict {
  "@": "AND";
  queries: QueryDict[];
}

export interface OrDict {
  "@": "OR";
  queries: QueryDict[];
}

export interface NotDict {
  "@": "NOT";
  match: QueryDict;
  no_match: QueryDict;
}

export type QueryDict =
  | PhraseDict
  | PhrasesDict
  | NearDict
  | ColumnFilterDict
  | AndDict
  | OrDict
  | NotDict;

function phraseToDict(node: PhraseNode): PhraseDict {
  const out: PhraseDict = { "@": "PHRASE", text: node.text };
  if (node.initial) out.initial = true;
  if (node.prefix) out.prefix = true;
  if (node.sequence) out.sequence = true;
  return out;
}

export function toDict(node: QueryNode): QueryDict {
  switch (node.type) {
    case "PHRASE":
      return phraseToDict(node);

    case "PHRASES":
      return { "@": "PHRASES", phrases: node.phrases.map(phraseToDict) };

    case "NEAR": {
      const out: NearDict = { "@": "NEAR", phrases: node.phrases.phrases.map(phraseToDict) };
      if (node.distance !== DEFAULT_NEAR_DISTANCE) out.distance = node.distance;
      return out;
    }

    case "COLUMNFILTER": {
      const out: ColumnFilterDict = {
        "@": "COLUMNFILTER",
        columns: [...node.columns],
        query: toDict(node.query),
      };
      if (node.filter === "exclude") out.filter = "exclude";
      return out;
    }

    case "AND":
      return { "@": "AND", queries: node.queries.map(toDict) };

    case "OR":
      return { "@": "OR", queries: node.queries.map(toDict) };

    case "NOT":
      return { "@": "NOT", match: toDict(node.match), no_match: toDict(node.noMatch) };
  }
}

// --- Input validation ---

type Path = readonly (string | number)[];

const Required = z.unknown().refine((v) => v !== undefined && v !== null, { message: "Required" });

const TaggedSchema = z
  .object({
    "@": z.enum(["PHRASE", "PHRASES", "NEAR", "COLUMNFILTER", "AND", "OR", "NOT"], {
      errorMap: () => ({ message: `"@" must name a query type` }),
    }),
  })
  .passthrough();

const PhraseSchema = z.object({
  text: z.union([z.string(), z.instanceof(QueryTokens)], {
    errorMap: () => ({ message: "Expected a string or QueryTokens" }),
  }),
  initial: z.boolean().default(false),
  prefix: z.boolean().default(false),
  sequence: z.boolean().default(false),
});

const PhrasesSchema = z.object({
  phrases: z.array(z.unknown()).min(1, "Expected at least one phrase"),
});

const NearSchema = z.object({
  phrases: Required,
  distance: z
    .number()
    .int("NEAR distance must be an integer")
    .min(1, "NEAR distance must be at least 1")
    .default(DEFAULT_NEAR_DISTANCE),
});

const ColumnFilterSchema = z.object({
  columns: z.array(z.string()).min(1, "Expected at least one column"),
  filter: z
    .enum(["include", "exclude"], { errorMap: () => ({ message: `filter must be "include" or "exclude"` }) })
    .default("include"),
  query: Required,
});

const QueriesSchema = z.object({
  queries: z.array(z.unknown()).min(1, "Expected at least one query"),
});

const NotSchema = z.object({
  match: Required,
  no_match: Required,
});

function describe(value: unknown): string {
  if (value instanceof QueryTokens) return `QueryTokens(${value.encode()})`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function check<T extends z.ZodTypeAny>(schema: T, value: unknown, path: Path): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  throw new QueryValidationError(`${issue.message} in ${describe(value)}`, value, [...path, ...issue.path]);
}

/** Runs a node constructor, locating any invariant failure at `path`. */
function build<T>(path: Path, construct: () => T): T {
  try {
    return construct();
  } catch (err) {
    if (err instanceof QueryValidationError && err.path.length === 0 && path.length > 0) {
      throw new QueryValidationError(err.message, err.value, path);
    }
    throw err;
  }
}

function decodePhrase(value: unknown, path: Path): PhraseNode {
  if (typeof value === "string" || value instanceof QueryTokens) {
    return phrase(value);
  }
  const tagged = check(TaggedSchema, value, path);
  if (tagged["@"] !== "PHRASE") {
    throw new QueryValidationError(`Expected a phrase, got ${tagged["@"]}`, value, path);
  }
  const { text, initial, prefix, sequence } = check(PhraseSchema, value, path);
  return build(path, () => phrase(text, { initial, prefix, sequence }));
}

function decodePhraseList(value: unknown, path: Path): PhraseNode[] {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new QueryValidationError("Expected at least one phrase", value, path);
    }
    return value.map((item, i) => decodePhrase(item, [...path, i]));
  }
  const tagged = check(TaggedSchema, value, path);
  if (tagged["@"] !== "PHRASES") {
    throw new QueryValidationError(`Expected phrases, got ${tagged["@"]}`, value, path);
  }
  const items = check(PhrasesSchema, value, path).phrases;
  return items.map((item, i) => decodePhrase(item, [...path, "phrases", i]));
}

function decodeQuery(value: unknown, path: Path, depth: number): QueryNode {
  if (depth > MAX_QUERY_DEPTH) {
    throw new QueryValidationError("Query nesting too deep", value, path);
  }

  if (typeof value === "string" || value instanceof QueryTokens) {
    return phrase(value);
  }

  if (Array.isArray(value)) {
    const list = decodePhraseList(value, path);
    const group = build(path, () => phrases(list));
    return group.phrases.length === 1 ? group.phrases[0] : group;
  }

  const tagged = check(TaggedSchema, value, path);
  switch (tagged["@"]) {
    case "PHRASE": {
      const node = decodePhrase(value, path);
      if (node.sequence) {
        throw new QueryValidationError("A phrase outside PHRASES cannot be a sequence (+)", value, path);
      }
      return node;
    }

    case "PHRASES": {
      const list = decodePhraseList(value, path);
      return build(path, () => phrases(list));
    }

    case "NEAR": {
      const { phrases: list, distance } = check(NearSchema, value, path);
      const decoded = decodePhraseList(list, [...path, "phrases"]);
      return build(path, () => near(phrases(decoded), distance));
    }

    case "COLUMNFILTER": {
      const { columns, filter, query } = check(ColumnFilterSchema, value, path);
      const inner = decodeQuery(query, [...path, "query"], depth + 1);
      return build(path, () => columnFilter(columns, inner, filter));
    }

    case "AND":
    case "OR": {
      const { queries } = check(QueriesSchema, value, path);
      const list = queries.map((q, i) => decodeQuery(q, [...path, "queries", i], depth + 1));
      if (list.length === 1) return list[0];
      return build(path, () => (tagged["@"] === "AND" ? and(list) : or(list)));
    }

    case "NOT": {
      const { match, no_match } = check(NotSchema, value, path);
      const left = decodeQuery(match, [...path, "match"], depth + 1);
      const right = decodeQuery(no_match, [...path, "no_match"], depth + 1);
      return build(path, () => not(left, right));
    }
  }
}

/**
 * Build a query from its dict form. Anywhere a phrase fits, a string or
 * QueryTokens may stand in for a PHRASE map, and an array of them for
 * PHRASES. AND and OR with a single query, and single-item arrays, collapse
 * to that item. Strings stay text even when they look like an encoded
 * QueryTokens marker; pass a QueryTokens (or `QueryTokens.decode`) for tokens.
 *
 *     fromDict({ "@": "AND", queries: ["hello", ["big", "world"]] })
 */
export function fromDict(value: unknown): QueryNode {
  return decodeQuery(value, [], 0);
}
