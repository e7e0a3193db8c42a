// SPDX-License-Identifier: Apache-2.0
import type { QueryTokens } from "./query-tokens";

export const TokenType = {
  STRING: "STRING",
  QUOTED: "QUOTED",
  OR: "OR",
  AND: "AND",
  NOT: "NOT",
  NEAR: "NEAR",
  COLON: "COLON",
  MINUS: "MINUS",
  LCP: "LCP",
  RCP: "RCP",
  LP: "LP",
  RP: "RP",
  CARET: "CARET",
  COMMA: "COMMA",
  PLUS: "PLUS",
  STAR: "STAR",
  EOF: "EOF",
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

// --- AST Node Types ---

export type ColumnFilterMode = "include" | "exclude";

/** Phrase text is free text for the tokenizer, or tokens supplied verbatim. */
export type PhraseText = string | QueryTokens;

export interface PhraseNode {
  readonly type: "PHRASE";
  readonly text: PhraseText;
  /** `^` was used: the phrase must match at the start of a column. */
  readonly initial: boolean;
  /** `*` was used: the last token is matched as a prefix. */
  readonly prefix: boolean;
  /** `+` was used: the phrase must directly follow the previous one. */
  readonly sequence: boolean;
}

export interface PhrasesNode {
  readonly type: "PHRASES";
  readonly phrases: readonly PhraseNode[];
}

export interface NearNode {
  readonly type: "NEAR";
  readonly phrases: PhrasesNode;
  readonly distance: number;
}

export interface ColumnFilterNode {
  readonly type: "COLUMNFILTER";
  readonly columns: readonly string[];
  readonly filter: ColumnFilterMode;
  readonly query: QueryNode;
}

export interface AndNode {
  readonly type: "AND";
  readonly queries: readonly QueryNode[];
}

export interface OrNode {
  readonly type: "OR";
  readonly queries: readonly QueryNode[];
}

export interface NotNode {
  readonly type: "NOT";
  readonly match: QueryNode;
  readonly noMatch: QueryNode;
}

export type QueryNode =
  | PhraseNode
  | PhrasesNode
  | NearNode
  | ColumnFilterNode
  | AndNode
  | OrNode
  | NotNode;

export type QueryNodeType = QueryNode["type"];

export const DEFAULT_NEAR_DISTANCE = 10;

/** Deepest nesting of groups, NEAR and column filters the parser and codec accept. */
export const MAX_QUERY_DEPTH = 256;
