// SPDX-License-Identifier: Apache-2.0
import {
  DEFAULT_NEAR_DISTANCE,
  MAX_QUERY_DEPTH,
  type AndNode,
  type ColumnFilterMode,
  type ColumnFilterNode,
  type NearNode,
  type NotNode,
  type OrNode,
  type PhraseNode,
  type PhrasesNode,
  type PhraseText,
  type QueryNode,
} from "./ast";
import { QueryValidationError } from "./errors";

// Every node is built through these functions, so an AST that exists
// satisfies its invariants whether it came from the parser, the dict codec
// or calling code.

// Boolean and column-filter levels below each node built here.
const depths = new WeakMap<QueryNode, number>();

/**
 * Levels of AND, OR, NOT and COLUMNFILTER from `node` down to its deepest
 * phrase, phrase list or NEAR. Never more than MAX_QUERY_DEPTH for a node
 * built through these constructors.
 */
export function queryDepth(node: QueryNode): number {
  const known = depths.get(node);
  if (known !== undefined) return known;
  let depth = 0;
  switch (node.type) {
    case "COLUMNFILTER":
      depth = 1 + queryDepth(node.query);
      break;
    case "AND":
    case "OR":
      depth = 1 + node.queries.reduce((max, q) => Math.max(max, queryDepth(q)), 0);
      break;
    case "NOT":
      depth = 1 + Math.max(queryDepth(node.match), queryDepth(node.noMatch));
      break;
  }
  depths.set(node, depth);
  return depth;
}

function limited<T extends QueryNode>(node: T): T {
  if (queryDepth(node) > MAX_QUERY_DEPTH) {
    throw new QueryValidationError("Query nesting too deep", node);
  }
  return node;
}

export interface PhraseOptions {
  initial?: boolean;
  prefix?: boolean;
  sequence?: boolean;
}

export function phrase(text: PhraseText, options: PhraseOptions = {}): PhraseNode {
  const { initial = false, prefix = false, sequence = false } = options;
  if (initial && sequence) {
    throw new QueryValidationError("a phrase cannot be both initial (^) and a sequence (+)", text);
  }
  return { type: "PHRASE", text, initial, prefix, sequence };
}

export function phrases(list: readonly PhraseNode[]): PhrasesNode {
  if (list.length === 0) {
    throw new QueryValidationError("PHRASES needs at least one phrase", list);
  }
  if (list[0].sequence) {
    throw new QueryValidationError("the first phrase cannot be a sequence (+)", list[0]);
  }
  return { type: "PHRASES", phrases: [...list] };
}

export function near(list: PhrasesNode, distance: number = DEFAULT_NEAR_DISTANCE): NearNode {
  if (list.phrases.length < 2) {
    throw new QueryValidationError("NEAR needs at least two phrases", list);
  }
  if (!Number.isInteger(distance) || distance < 1) {
    throw new QueryValidationError(`NEAR distance must be an integer of at least 1, got ${distance}`, distance);
  }
  return { type: "NEAR", phrases: list, distance };
}

/** A query outside PHRASES starts its own phrase sequence. */
function standalone(query: QueryNode): QueryNode {
  if (query.type === "PHRASE" && query.sequence) {
    throw new QueryValidationError("a phrase outside PHRASES cannot be a sequence (+)", query);
  }
  return query;
}

export function columnFilter(
  columns: readonly string[],
  query: QueryNode,
  filter: ColumnFilterMode = "include",
): ColumnFilterNode {
  if (columns.length === 0) {
    throw new QueryValidationError("COLUMNFILTER needs at least one column", columns);
  }
  return limited<ColumnFilterNode>({ type: "COLUMNFILTER", columns: [...columns], filter, query: standalone(query) });
}

function flatten(type: "AND" | "OR", queries: readonly QueryNode[]): QueryNode[] {
  if (queries.length === 0) {
    throw new QueryValidationError(`${type} needs at least one query`, queries);
  }
  const out: QueryNode[] = [];
  for (const q of queries) {
    if ((q.type === "AND" || q.type === "OR") && q.type === type) out.push(...q.queries);
    else out.push(standalone(q));
  }
  return out;
}

export function and(queries: readonly QueryNode[]): AndNode {
  return limited<AndNode>({ type: "AND", queries: flatten("AND", queries) });
}

export function or(queries: readonly QueryNode[]): OrNode {
  return limited<OrNode>({ type: "OR", queries: flatten("OR", queries) });
}

export function not(match: QueryNode, noMatch: QueryNode): NotNode {
  return limited<NotNode>({ type: "NOT", match: standalone(match), noMatch: standalone(noMatch) });
}
