// SPDX-License-Identifier: Apache-2.0
export { TokenType, DEFAULT_NEAR_DISTANCE, MAX_QUERY_DEPTH } from "./query/ast";
export type {
  Token,
  QueryNode,
  QueryNodeType,
  PhraseNode,
  PhrasesNode,
  NearNode,
  ColumnFilterNode,
  ColumnFilterMode,
  AndNode,
  OrNode,
  NotNode,
  PhraseText,
} from "./query/ast";
export {
  QueryError,
  QueryParseError,
  QueryValidationError,
  QueryNodeNotFoundError,
  formatParseError,
} from "./query/errors";
export { QueryTokens, QUERY_TOKENS_MARKER } from "./query/query-tokens";
export type { TokenSlot } from "./query/query-tokens";
export { phrase, phrases, near, columnFilter, and, or, not, queryDepth } from "./query/nodes";
export type { PhraseOptions } from "./query/nodes";
export { lex } from "./query/lexer";
export { parse } from "./query/parser";
export { toDict, fromDict } from "./query/dict";
export type {
  QueryDict,
  PhraseDict,
  PhrasesDict,
  NearDict,
  ColumnFilterDict,
  AndDict,
  OrDict,
  NotDict,
} from "./query/dict";
export { toQueryString, quote } from "./query/canonicalize";
export { walk, extractWithColumnFilters, applicableColumns } from "./query/walk";
export type { WalkEntry } from "./query/walk";
