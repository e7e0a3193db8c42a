// SPDX-License-Identifier: Apache-2.0
import type { ColumnFilterNode, QueryNode } from "./ast";
import { QueryNodeNotFoundError } from "./errors";
import { columnFilter, phrase } from "./nodes";

/** A node and its ancestors, root first. */
export type WalkEntry = readonly [ancestors: readonly QueryNode[], node: QueryNode];

function childrenOf(node: QueryNode): readonly QueryNode[] {
  switch (node.type) {
    case "PHRASE":
      return [];
    case "PHRASES":
      return node.phrases;
    case "NEAR":
      return [node.phrases];
    case "COLUMNFILTER":
      return [node.query];
    case "AND":
    case "OR":
      return node.queries;
    case "NOT":
      return [node.match, node.noMatch];
  }
}

/**
 * Visit every node top-down, depth first, yielding `[ancestors, node]`.
 * The root comes first with no ancestors.
 *
 *     for (const [ancestors, node] of walk(query)) {
 *       if (node.type === "PHRASE") console.log(node.text, ancestors.length);
 *     }
 */
export function* walk(root: QueryNode): Generator<WalkEntry, void, undefined> {
  const stack: WalkEntry[] = [[[], root]];
  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    yield entry;
    const [ancestors, node] = entry;
    const children = childrenOf(node);
    const path = [...ancestors, node];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push([path, children[i]]);
    }
  }
}

function ancestorsOf(node: QueryNode, root: QueryNode): readonly QueryNode[] {
  for (const [ancestors, candidate] of walk(root)) {
    if (candidate === node) return ancestors;
  }
  throw new QueryNodeNotFoundError();
}

function isColumnFilter(node: QueryNode): node is ColumnFilterNode {
  return node.type === "COLUMNFILTER";
}

/**
 * Returns `node` wrapped in every column filter between it and `root`, so it
 * can be run on its own and still match the same columns. `node` is found by
 * identity. A `+` phrase loses its sequence flag, having no phrase before it.
 */
export function extractWithColumnFilters(node: QueryNode, root: QueryNode): QueryNode {
  const filters = ancestorsOf(node, root).filter(isColumnFilter);

  let result: QueryNode =
    node.type === "PHRASE" && node.sequence
      ? phrase(node.text, { initial: node.initial, prefix: node.prefix })
      : node;
  for (let i = filters.length - 1; i >= 0; i--) {
    result = columnFilter(filters[i].columns, result, filters[i].filter);
  }
  return result;
}

function asciiLower(s: string): string {
  return s.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

/**
 * Which of `allColumns` phrase matching at `node` runs against, after the
 * column filters above it. Names compare ASCII case-insensitively; filter
 * names that match no remaining column have no effect.
 */
export function applicableColumns(
  node: QueryNode,
  root: QueryNode,
  allColumns: Iterable<string>,
): Set<string> {
  const filters = ancestorsOf(node, root).filter(isColumnFilter);
  let columns = new Set(allColumns);

  for (const filter of filters) {
    const wanted = new Set(filter.columns.map(asciiLower));
    const matches = new Set([...columns].filter((c) => wanted.has(asciiLower(c))));
    if (filter.filter === "include") {
      columns = matches;
    } else {
      for (const c of matches) columns.delete(c);
    }
  }
  return columns;
}
