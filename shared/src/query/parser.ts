// SPDX-License-Identifier: Apache-2.0
import {
  DEFAULT_NEAR_DISTANCE,
  MAX_QUERY_DEPTH,
  TokenType,
  type ColumnFilterMode,
  type NearNode,
  type PhraseNode,
  type PhrasesNode,
  type QueryNode,
  type Token,
} from "./ast";
import { QueryParseError, QueryValidationError } from "./errors";
import { lex } from "./lexer";
import { and, columnFilter, near, not, or, phrase, phrases } from "./nodes";
import { QueryTokens } from "./query-tokens";

// Implicit AND (adjacent parts) binds tighter than all of these.
const INFIX_PRECEDENCE = new Map<TokenType, number>([
  [TokenType.OR, 10],
  [TokenType.AND, 20],
  [TokenType.NOT, 30],
]);

const PART_START = new Set<TokenType>([
  TokenType.MINUS,
  TokenType.LCP,
  TokenType.NEAR,
  TokenType.CARET,
  TokenType.STRING,
  TokenType.QUOTED,
]);

function isString(type: TokenType): boolean {
  return type === TokenType.STRING || type === TokenType.QUOTED;
}

class Parser {
  private query: string;
  private tokens: Token[];
  private pos = 0;
  private depth = 0;

  constructor(query: string) {
    this.query = query;
    this.tokens = lex(query);
  }

  parse(): QueryNode {
    if (this.at(TokenType.EOF)) this.error("No query provided", null);
    const node = this.parseQuery(0);
    if (!this.at(TokenType.EOF)) this.error("Unexpected token", this.peek());
    return node;
  }

  private error(message: string, token: Token | null): never {
    throw new QueryParseError(this.query, message, token ? token.start : 0);
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    return this.tokens[this.pos++];
  }

  private at(type: TokenType): boolean {
    return this.peek().type === type;
  }

  // Nesting limits enforced by the node constructors become parse errors at `token`.
  private build<T>(token: Token, construct: () => T): T {
    try {
      return construct();
    } catch (err) {
      if (err instanceof QueryValidationError) this.error(err.message, token);
      throw err;
    }
  }

  private enter(token: Token): void {
    if (++this.depth > MAX_QUERY_DEPTH) this.error("Query nesting too deep", token);
  }

  private leave(): void {
    this.depth--;
  }

  private parseQuery(rbp: number): QueryNode {
    let left = this.parseImplicitAnd();

    for (;;) {
      const precedence = INFIX_PRECEDENCE.get(this.peek().type) ?? 0;
      if (precedence <= rbp) break;
      const op = this.advance();
      const right = this.parseQuery(precedence);
      left = this.infix(op, left, right);
    }
    return left;
  }

  // and() and or() splice operands of their own kind, so chains stay flat.
  private infix(op: Token, left: QueryNode, right: QueryNode): QueryNode {
    return this.build(op, () => {
      switch (op.type) {
        case TokenType.NOT:
          return not(left, right);
        case TokenType.AND:
          return and([left, right]);
        default:
          return or([left, right]);
      }
    });
  }

  private parseImplicitAnd(): QueryNode {
    const start = this.peek();
    const sequence: QueryNode[] = [this.parsePart()];

    while (PART_START.has(this.peek().type)) {
      // nothing is implied after a parenthesized group, except NEAR(...)
      const last = sequence[sequence.length - 1];
      if (this.tokens[this.pos - 1].type === TokenType.RP && last.type !== "NEAR") break;
      sequence.push(this.parsePart());
    }

    return sequence.length === 1 ? sequence[0] : this.build(start, () => and(sequence));
  }

  private isColumnFilterStart(): boolean {
    const t = this.peek().type;
    return (
      t === TokenType.MINUS ||
      t === TokenType.LCP ||
      (isString(t) && this.peek(1).type === TokenType.COLON)
    );
  }

  private parsePart(): QueryNode {
    if (this.isColumnFilterStart()) return this.parseColumnFilter();
    if (this.at(TokenType.LP)) return this.parseGroup();
    if (this.at(TokenType.NEAR)) return this.parseNear();
    return this.parsePhraseRun();
  }

  private parseGroup(): QueryNode {
    const open = this.advance();
    this.enter(open);
    const inner = this.parseQuery(0);
    if (!this.at(TokenType.RP)) {
      if (this.at(TokenType.EOF)) this.error("Unclosed (", open);
      this.error(`Expected ) to close ( at position ${open.start}`, this.peek());
    }
    this.advance();
    this.leave();
    return inner;
  }

  private isPhraseStart(): boolean {
    const t = this.peek().type;
    if (t === TokenType.CARET || t === TokenType.PLUS) return true;
    return isString(t) && this.peek(1).type !== TokenType.COLON;
  }

  private parsePhraseRun(): PhraseNode | PhrasesNode {
    const run: PhraseNode[] = [this.parsePhrase(true)];
    while (this.isPhraseStart()) {
      run.push(this.parsePhrase(false));
    }
    return run.length === 1 ? run[0] : phrases(run);
  }

  private parsePhrase(first: boolean): PhraseNode {
    let sequence = false;
    let initial = false;

    if (this.at(TokenType.PLUS)) {
      const plus = this.advance();
      if (first) this.error("A phrase sequence cannot start with +", plus);
      sequence = true;
    }
    if (this.at(TokenType.CARET)) {
      const caret = this.advance();
      if (sequence) this.error("A phrase cannot be both initial (^) and a sequence (+)", caret);
      initial = true;
    }

    const term = this.peek();
    if (!isString(term.type)) this.error("Expected a search term", term);
    this.advance();

    let prefix = false;
    if (this.at(TokenType.STAR)) {
      this.advance();
      prefix = true;
    }

    return phrase(QueryTokens.decode(term.value) ?? term.value, { initial, prefix, sequence });
  }

  private parseNear(): NearNode {
    const keyword = this.advance();
    this.enter(keyword);
    if (!this.at(TokenType.LP)) this.error("Expected ( after NEAR", this.peek());
    this.advance();

    const run = this.parsePhraseRun();
    if (run.type !== "PHRASES") this.error("NEAR requires at least two phrases", this.peek());

    let distance = DEFAULT_NEAR_DISTANCE;
    if (this.at(TokenType.COMMA)) {
      this.advance();
      const number = this.peek();
      // a quoted "10" is not a number
      if (number.type !== TokenType.STRING || !/^[0-9]+$/.test(number.value)) {
        this.error("Expected a number for the NEAR distance", number);
      }
      distance = Number(number.value);
      if (!Number.isSafeInteger(distance) || distance < 1) {
        this.error("Expected a NEAR distance of at least 1", number);
      }
      this.advance();
    }

    if (!this.at(TokenType.RP)) this.error("Expected ) to close NEAR", this.peek());
    this.advance();
    this.leave();
    return near(run, distance);
  }

  private parseColumnFilter(): QueryNode {
    const start = this.peek();
    this.enter(start);

    let filter: ColumnFilterMode = "include";
    if (this.at(TokenType.MINUS)) {
      this.advance();
      filter = "exclude";
    }

    const columns: string[] = [];
    if (this.at(TokenType.LCP)) {
      this.advance();
      while (isString(this.peek().type)) {
        columns.push(this.advance().value);
      }
      if (columns.length === 0) this.error("Expected column name", this.peek());
      if (!this.at(TokenType.RCP)) this.error("Expected }", this.peek());
      this.advance();
    } else {
      if (!isString(this.peek().type)) this.error("Expected column name", this.peek());
      columns.push(this.advance().value);
    }

    if (!this.at(TokenType.COLON)) this.error("Expected :", this.peek());
    this.advance();

    let query: QueryNode;
    if (this.at(TokenType.LP)) query = this.parseGroup();
    else if (this.at(TokenType.NEAR)) query = this.parseNear();
    else if (this.isColumnFilterStart()) query = this.parseColumnFilter();
    else query = this.parsePhraseRun();

    this.leave();
    return this.build(start, () => columnFilter(columns, query, filter));
  }
}

export function parse(input: string): QueryNode {
  return new Parser(input).parse();
}
