// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { lex } from "./lexer";
import { QueryParseError } from "./errors";

function lexError(input: string): QueryParseError {
  try {
    lex(input);
  } catch (err) {
    if (err instanceof QueryParseError) return err;
    throw err;
  }
  throw new Error(`expected lex(${JSON.stringify(input)}) to fail`);
}

describe("lex", () => {
  test("empty string produces only EOF", () => {
    expect(lex("")).toEqual([{ type: "EOF", value: "", start: 0, end: 0 }]);
  });

  test("whitespace-only produces only EOF at the end", () => {
    expect(lex(" \t\r\n")).toEqual([{ type: "EOF", value: "", start: 4, end: 4 }]);
  });

  test("two barewords separated by whitespace", () => {
    expect(lex("hello world")).toEqual([
      { type: "STRING", value: "hello", start: 0, end: 5 },
      { type: "STRING", value: "world", start: 6, end: 11 },
      { type: "EOF", value: "", start: 11, end: 11 },
    ]);
  });

  test("single-character tokens", () => {
    expect(lex("(){}:,+*-^").map((t) => t.type)).toEqual([
      "LP", "RP", "LCP", "RCP", "COLON", "COMMA", "PLUS", "STAR", "MINUS", "CARET", "EOF",
    ]);
  });

  test("punctuation splits barewords", () => {
    expect(lex("title:one*")).toMatchObject([
      { type: "STRING", value: "title" },
      { type: "COLON", value: ":" },
      { type: "STRING", value: "one" },
      { type: "STAR", value: "*" },
      { type: "EOF" },
    ]);
  });

  test("underscore, digits and non-ASCII characters are bareword characters", () => {
    expect(lex("snake_case 42 café")).toMatchObject([
      { type: "STRING", value: "snake_case" },
      { type: "STRING", value: "42" },
      { type: "STRING", value: "café" },
      { type: "EOF" },
    ]);
  });

  test("the legacy \\x1a control character is a bareword character", () => {
    expect(lex("a\x1ab")).toMatchObject([{ type: "STRING", value: "a\x1ab" }, { type: "EOF" }]);
  });

  test("quoted string keeps spaces and punctuation", () => {
    expect(lex('"one two: (three)"')).toEqual([
      { type: "QUOTED", value: "one two: (three)", start: 0, end: 18 },
      { type: "EOF", value: "", start: 18, end: 18 },
    ]);
  });

  test("doubled quote inside a string is a literal quote", () => {
    expect(lex('"a""b"')).toEqual([
      { type: "QUOTED", value: 'a"b', start: 0, end: 6 },
      { type: "EOF", value: "", start: 6, end: 6 },
    ]);
  });

  test("a string holding only an escaped quote", () => {
    expect(lex('""""')[0]).toEqual({ type: "QUOTED", value: '"', start: 0, end: 4 });
  });

  test("empty quoted string", () => {
    expect(lex('""')[0]).toEqual({ type: "QUOTED", value: "", start: 0, end: 2 });
  });

  test("quoted string directly followed by a bareword", () => {
    expect(lex('"a"b')).toMatchObject([
      { type: "QUOTED", value: "a" },
      { type: "STRING", value: "b" },
      { type: "EOF" },
    ]);
  });

  test("keywords are case-sensitive", () => {
    expect(lex("a OR b AND c NOT d or e").map((t) => t.type)).toEqual([
      "STRING", "OR", "STRING", "AND", "STRING", "NOT", "STRING", "STRING", "STRING", "EOF",
    ]);
  });

  test("quoted keywords are strings", () => {
    expect(lex('"OR"')[0].type).toBe("QUOTED");
  });

  test("NEAR followed by ( is an operator", () => {
    expect(lex("NEAR(a b)").map((t) => t.type)).toEqual([
      "NEAR", "LP", "STRING", "STRING", "RP", "EOF",
    ]);
  });

  test("whitespace between NEAR and ( is allowed", () => {
    expect(lex("NEAR (a b)")[0].type).toBe("NEAR");
  });

  test("NEAR not followed by ( is demoted to a string", () => {
    expect(lex("one NEAR two")).toMatchObject([
      { type: "STRING", value: "one" },
      { type: "STRING", value: "NEAR" },
      { type: "STRING", value: "two" },
      { type: "EOF" },
    ]);
  });

  test("NEAR at the end of input is a string", () => {
    expect(lex("NEAR")[0]).toEqual({ type: "STRING", value: "NEAR", start: 0, end: 4 });
  });
});

describe("lex errors", () => {
  test("unterminated quote points at the opening quote", () => {
    const err = lexError('one "two');
    expect(err.message).toBe("No ending double quote");
    expect(err.position).toBe(4);
    expect(err.query).toBe('one "two');
  });

  test("a trailing escaped quote does not close the string", () => {
    expect(lexError('"abc""').position).toBe(0);
  });

  test("invalid character reports its offset", () => {
    const err = lexError("one & two");
    expect(err.message).toBe("Invalid query character '&'");
    expect(err.position).toBe(4);
  });

  test("a dot is not a bareword character", () => {
    expect(lexError("a.b").position).toBe(1);
  });
});
