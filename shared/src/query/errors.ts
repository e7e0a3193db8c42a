// SPDX-License-Identifier: Apache-2.0

export class QueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueryError";
  }
}

/**
 * Raised by the lexer and parser. `position` is the character offset of the
 * offending token in `query`.
 */
export class QueryParseError extends QueryError {
  readonly query: string;
  readonly position: number;

  constructor(query: string, message: string, position: number) {
    super(message);
    this.name = "QueryParseError";
    this.query = query;
    this.position = position;
  }
}

/**
 * Raised when an AST node or dict value breaks an invariant. `path` locates
 * the value inside the dict being decoded (empty for direct construction).
 */
export class QueryValidationError extends QueryError {
  readonly value: unknown;
  readonly path: readonly (string | number)[];

  constructor(message: string, value: unknown, path: readonly (string | number)[] = []) {
    super(path.length > 0 ? `${formatPath(path)}: ${message}` : message);
    this.name = "QueryValidationError";
    this.value = value;
    this.path = path;
  }
}

export class QueryNodeNotFoundError extends QueryError {
  constructor() {
    super("node is not part of the query");
    this.name = "QueryNodeNotFoundError";
  }
}

export function formatPath(path: readonly (string | number)[]): string {
  let out = "$";
  for (const part of path) {
    out += typeof part === "number" ? `[${part}]` : `.${part}`;
  }
  return out;
}

/**
 * Render a parse error for end users: the query, then a caret under the
 * offending character followed by the message.
 */
export function formatParseError(err: QueryParseError): string {
  return `${err.query}\n${" ".repeat(err.position)}^ ${err.message}`;
}
