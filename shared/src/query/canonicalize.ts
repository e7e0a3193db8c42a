// SPDX-License-Identifier: Apache-2.0
import {
  DEFAULT_NEAR_DISTANCE,
  type ColumnFilterNode,
  type PhraseNode,
  type PhraseText,
  type QueryNode,
  type QueryNodeType,
} from "./ast";

// A child is parenthesized when it binds more loosely than its parent.
const PRIORITY: Record<QueryNodeType, number> = {
  OR: 10,
  AND: 20,
  NOT: 30,
  COLUMNFILTER: 50,
  NEAR: 60,
  PHRASES: 70,
  PHRASE: 80,
};

const RESERVED_WORDS = new Set(["OR", "AND", "NOT", "NEAR"]);

function needsQuoting(text: string): boolean {
  if (text === "" || RESERVED_WORDS.has(text)) return true;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0x80) continue;
    const bare =
      (code >= 0x30 && code <= 0x39) ||
      (code >= 0x41 && code <= 0x5a) ||
      (code >= 0x61 && code <= 0x7a) ||
      code === 0x5f;
    if (!bare) return true;
  }
  return false;
}

/**
 * Quote text so the lexer reads it back as a single string token.
 *
 *   hello    -> hello
 *   one two  -> "one two"
 *   one"two  -> "one""two"
 *   (empty)  -> ""
 *
 * The keywords OR, AND, NOT and NEAR are quoted too, so a phrase with that
 * text is not read back as an operator.
 */
export function quote(text: PhraseText): string {
  const value = typeof text === "string" ? text : text.encode();
  return needsQuoting(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function wrap(child: QueryNode, parent: QueryNode, inclusive = false): string {
  const text = serializeNode(child);
  const lower = inclusive
    ? PRIORITY[child.type] <= PRIORITY[parent.type]
    : PRIORITY[child.type] < PRIORITY[parent.type];
  return lower ? `(${text})` : text;
}

function serializePhrase(node: PhraseNode): string {
  let out = "";
  if (node.initial) out += "^";
  if (node.sequence) out += "+";
  out += quote(node.text);
  if (node.prefix) out += "*";
  return out;
}

function serializeColumnFilter(node: ColumnFilterNode): string {
  let out = node.filter === "exclude" ? "-" : "";
  const columns = node.columns.map(quote).join(" ");
  out += node.columns.length > 1 ? `{${columns}}` : columns;
  out += ": ";
  switch (node.query.type) {
    case "PHRASE":
    case "PHRASES":
    case "NEAR":
    case "COLUMNFILTER":
      return out + serializeNode(node.query);
    default:
      return out + `(${serializeNode(node.query)})`;
  }
}

function serializeNode(node: QueryNode): string {
  switch (node.type) {
    case "PHRASE":
      return serializePhrase(node);

    case "PHRASES":
      return node.phrases.map(serializePhrase).join(" ");

    case "NEAR": {
      const body = serializeNode(node.phrases);
      return node.distance === DEFAULT_NEAR_DISTANCE
        ? `NEAR(${body})`
        : `NEAR(${body}, ${node.distance})`;
    }

    case "COLUMNFILTER":
      return serializeColumnFilter(node);

    case "OR":
      return node.queries.map((q) => wrap(q, node)).join(" OR ");

    case "AND": {
      let out = "";
      node.queries.forEach((q, i) => {
        if (i > 0) {
          // adjacent NEAR groups are implicitly ANDed
          out += q.type === "NEAR" && node.queries[i - 1].type === "NEAR" ? " " : " AND ";
        }
        out += wrap(q, node);
      });
      return out;
    }

    case "NOT":
      // NOT is left-associative: a NOT on the right keeps its parentheses
      return `${wrap(node.match, node)} NOT ${wrap(node.noMatch, node, true)}`;
  }
}

/**
 * Render a query as text the parser reads back to an equal AST. Parentheses
 * appear only where precedence needs them; the default NEAR distance is
 * omitted.
 */
export function toQueryString(node: QueryNode): string {
  return serializeNode(node);
}
