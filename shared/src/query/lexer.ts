// SPDX-License-Identifier: Apache-2.0
import { TokenType, type Token } from "./ast";
import { QueryParseError } from "./errors";

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  "(": TokenType.LP,
  ")": TokenType.RP,
  "{": TokenType.LCP,
  "}": TokenType.RCP,
  ":": TokenType.COLON,
  ",": TokenType.COMMA,
  "+": TokenType.PLUS,
  "*": TokenType.STAR,
  "-": TokenType.MINUS,
  "^": TokenType.CARET,
};

// Case-sensitive: "or" is an ordinary word.
const KEYWORDS = new Map<string, TokenType>([
  ["OR", TokenType.OR],
  ["AND", TokenType.AND],
  ["NOT", TokenType.NOT],
  ["NEAR", TokenType.NEAR],
]);

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isBarewordChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (
    (code >= 0x30 && code <= 0x39) ||
    (code >= 0x41 && code <= 0x5a) ||
    (code >= 0x61 && code <= 0x7a) ||
    code === 0x5f ||
    code === 0x1a ||
    code >= 0x80
  );
}

export function lex(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const ch = input[pos];

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    if (ch in SINGLE_CHAR_TOKENS) {
      tokens.push({ type: SINGLE_CHAR_TOKENS[ch], value: ch, start: pos, end: pos + 1 });
      pos++;
      continue;
    }

    if (ch === '"') {
      const tokenStart = pos;
      let value = "";
      pos++;
      for (;;) {
        const close = input.indexOf('"', pos);
        if (close < 0) {
          throw new QueryParseError(input, "No ending double quote", tokenStart);
        }
        value += input.slice(pos, close);
        if (input[close + 1] === '"') {
          // "" inside a string is a literal quote
          value += '"';
          pos = close + 2;
          continue;
        }
        pos = close + 1;
        break;
      }
      tokens.push({ type: TokenType.QUOTED, value, start: tokenStart, end: pos });
      continue;
    }

    const start = pos;
    while (pos < input.length && isBarewordChar(input[pos])) {
      pos++;
    }
    if (pos === start) {
      throw new QueryParseError(input, `Invalid query character '${ch}'`, pos);
    }
    const value = input.slice(start, pos);
    tokens.push({ type: KEYWORDS.get(value) ?? TokenType.STRING, value, start, end: pos });
  }

  tokens.push({ type: TokenType.EOF, value: "", start: input.length, end: input.length });

  // NEAR is only an operator in NEAR(...)
  for (let i = 0; i < tokens.length - 1; i++) {
    if (tokens[i].type === TokenType.NEAR && tokens[i + 1].type !== TokenType.LP) {
      tokens[i] = { ...tokens[i], type: TokenType.STRING };
    }
  }

  return tokens;
}
