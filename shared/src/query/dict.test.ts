// SPDX-License-Identifier: Apache-2.0
import { describe, it, expect } from "vitest";
import { fromDict, toDict } from "./dict";
import { parse } from "./parser";
import { toQueryString } from "./canonicalize";
import { MAX_QUERY_DEPTH } from "./ast";
import { and, near, phrase, phrases } from "./nodes";
import { QueryValidationError } from "./errors";
import { QueryTokens } from "./query-tokens";

function dictError(value: unknown): QueryValidationError {
  try {
    fromDict(value);
  } catch (err) {
    if (err instanceof QueryValidationError) return err;
    throw err;
  }
  throw new Error(`expected fromDict(${JSON.stringify(value)}) to fail`);
}

describe("toDict", () => {
  it("writes a phrase without default flags", () => {
    expect(toDict(parse("hello"))).toEqual({ "@": "PHRASE", text: "hello" });
  });

  it("writes phrase flags that are set", () => {
    expect(toDict(parse("^a* +b"))).toEqual({
      "@": "PHRASES",
      phrases: [
        { "@": "PHRASE", text: "a", initial: true, prefix: true },
        { "@": "PHRASE", text: "b", sequence: true },
      ],
    });
  });

  it("writes NEAR phrases as a list", () => {
    expect(toDict(parse("NEAR(a b, 3)"))).toEqual({
      "@": "NEAR",
      phrases: [
        { "@": "PHRASE", text: "a" },
        { "@": "PHRASE", text: "b" },
      ],
      distance: 3,
    });
  });

  it("omits the default NEAR distance", () => {
    expect(toDict(parse("NEAR(a b)"))).not.toHaveProperty("distance");
  });

  it("writes the exclude filter and omits include", () => {
    expect(toDict(parse("-t:x"))).toEqual({
      "@": "COLUMNFILTER",
      columns: ["t"],
      filter: "exclude",
      query: { "@": "PHRASE", text: "x" },
    });
    expect(toDict(parse("t:x"))).not.toHaveProperty("filter");
  });

  it("writes NOT with match and no_match", () => {
    expect(toDict(parse("a NOT b"))).toEqual({
      "@": "NOT",
      match: { "@": "PHRASE", text: "a" },
      no_match: { "@": "PHRASE", text: "b" },
    });
  });

  it("serializes QueryTokens to their marker text", () => {
    const dict = toDict(phrase(new QueryTokens(["a", ["b", "c"]])));
    expect(JSON.stringify(dict)).toBe('{"@":"PHRASE","text":"$!Tokens~a|b>c"}');
  });
});

describe("fromDict", () => {
  it("reads a string as a phrase", () => {
    expect(fromDict("hello")).toEqual(phrase("hello"));
  });

  it("reads an array as PHRASES, not AND", () => {
    const seq = fromDict(["hello", "world"]);
    expect(seq).toEqual(phrases([phrase("hello"), phrase("world")]));
    expect(seq).not.toEqual(fromDict({ "@": "AND", queries: ["hello", "world"] }));
  });

  it("collapses a single-item array to its phrase", () => {
    expect(fromDict(["only"])).toEqual(phrase("only"));
  });

  it("collapses AND with one query", () => {
    expect(fromDict({ "@": "AND", queries: ["a"] })).toEqual(phrase("a"));
  });

  it("flattens nested AND", () => {
    expect(fromDict({ "@": "AND", queries: [{ "@": "AND", queries: ["a", "b"] }, "c"] })).toEqual(
      and([phrase("a"), phrase("b"), phrase("c")]),
    );
  });

  it("accepts strings inside NEAR", () => {
    expect(fromDict({ "@": "NEAR", phrases: ["a", "b"], distance: 4 })).toEqual(
      near(phrases([phrase("a"), phrase("b")]), 4),
    );
  });

  it("accepts a PHRASES map inside NEAR", () => {
    expect(fromDict({ "@": "NEAR", phrases: { "@": "PHRASES", phrases: ["a", "b"] } })).toEqual(
      near(phrases([phrase("a"), phrase("b")])),
    );
  });

  it("keeps marker-like strings as text", () => {
    expect(fromDict(JSON.parse('{"@":"PHRASE","text":"$!Tokens~a|b>c"}'))).toEqual(phrase("$!Tokens~a|b>c"));
  });

  it("round trips a phrase whose text looks like a marker", () => {
    const ast = phrase("$!Tokens~a");
    expect(fromDict(toDict(ast))).toEqual(ast);
  });

  it("accepts QueryTokens as text", () => {
    const tokens = new QueryTokens(["x"]);
    expect(fromDict({ "@": "PHRASE", text: tokens, prefix: true })).toEqual(phrase(tokens, { prefix: true }));
  });
});

describe("fromDict errors", () => {
  it("rejects NEAR with one phrase", () => {
    const err = dictError({ "@": "NEAR", phrases: ["hello"] });
    expect(err.message).toBe("NEAR needs at least two phrases");
    expect(err.path).toEqual([]);
  });

  it("rejects a NEAR distance of zero", () => {
    const err = dictError({ "@": "NEAR", phrases: ["a", "b"], distance: 0 });
    expect(err.path).toEqual(["distance"]);
    expect(err.message).toBe(
      '$.distance: NEAR distance must be at least 1 in {"@":"NEAR","phrases":["a","b"],"distance":0}',
    );
  });

  it("rejects a fractional NEAR distance", () => {
    const err = dictError({ "@": "NEAR", phrases: ["a", "b"], distance: 1.5 });
    expect(err.path).toEqual(["distance"]);
    expect(err.message).toContain("NEAR distance must be an integer");
  });

  it("locates errors in nested queries", () => {
    const err = dictError({ "@": "AND", queries: ["a", { "@": "NEAR", phrases: ["b", "c"], distance: 0 }] });
    expect(err.path).toEqual(["queries", 1, "distance"]);
    expect(err.message.startsWith("$.queries[1].distance: ")).toBe(true);
  });

  it("rejects an unknown filter", () => {
    const err = dictError({ "@": "COLUMNFILTER", columns: ["t"], filter: "sideways", query: "a" });
    expect(err.path).toEqual(["filter"]);
    expect(err.message).toContain('filter must be "include" or "exclude"');
  });

  it("rejects an empty column list", () => {
    const err = dictError({ "@": "COLUMNFILTER", columns: [], query: "a" });
    expect(err.path).toEqual(["columns"]);
    expect(err.message).toContain("Expected at least one column");
  });

  it("rejects a map without a query type", () => {
    const err = dictError({ text: "a" });
    expect(err.path).toEqual(["@"]);
    expect(err.message).toContain('"@" must name a query type');
  });

  it("rejects an unknown query type", () => {
    expect(dictError({ "@": "XOR", queries: ["a", "b"] }).path).toEqual(["@"]);
  });

  it("requires no_match on NOT", () => {
    const err = dictError({ "@": "NOT", match: "a" });
    expect(err.path).toEqual(["no_match"]);
    expect(err.message).toContain("Required");
  });

  it("rejects non-string text", () => {
    const err = dictError({ "@": "PHRASE", text: 5 });
    expect(err.path).toEqual(["text"]);
    expect(err.message).toContain("Expected a string or QueryTokens");
  });

  it("rejects an empty phrase list", () => {
    expect(dictError([]).message).toBe("Expected at least one phrase");
  });

  it("rejects an empty query list", () => {
    expect(dictError({ "@": "OR", queries: [] }).path).toEqual(["queries"]);
  });

  it("rejects a phrase that is both initial and a sequence", () => {
    const err = dictError({
      "@": "PHRASES",
      phrases: ["a", { "@": "PHRASE", text: "b", initial: true, sequence: true }],
    });
    expect(err.path).toEqual(["phrases", 1]);
    expect(err.message).toBe("$.phrases[1]: a phrase cannot be both initial (^) and a sequence (+)");
  });

  it("rejects a sequence flag on the first phrase", () => {
    const err = dictError({ "@": "PHRASES", phrases: [{ "@": "PHRASE", text: "a", sequence: true }, "b"] });
    expect(err.message).toBe("the first phrase cannot be a sequence (+)");
  });

  it("rejects a sequence phrase outside PHRASES", () => {
    expect(dictError({ "@": "PHRASE", text: "a", sequence: true }).message).toBe(
      "A phrase outside PHRASES cannot be a sequence (+)",
    );
  });

  it("rejects a non-phrase inside a phrase list", () => {
    const err = dictError({ "@": "NEAR", phrases: [{ "@": "OR", queries: ["x", "y"] }, "b"] });
    expect(err.path).toEqual(["phrases", 0]);
    expect(err.message).toBe("$.phrases[0]: Expected a phrase, got OR");
  });

  it("rejects values that are not queries", () => {
    expect(dictError(5)).toBeInstanceOf(QueryValidationError);
    expect(dictError(null)).toBeInstanceOf(QueryValidationError);
  });

  it("rejects very deep nesting", () => {
    let value: unknown = "a";
    for (let i = 0; i < 300; i++) value = { "@": "COLUMNFILTER", columns: ["c"], query: value };
    expect(dictError(value).message).toMatch(/: Query nesting too deep$/);
  });
});

function notChain(terms: number): string {
  return Array.from({ length: terms }, (_, i) => `w${i}`).join(" NOT ");
}

describe("deep NOT chains", () => {
  it("round trips the deepest chain the parser accepts", () => {
    const ast = parse(notChain(MAX_QUERY_DEPTH + 1));
    expect(fromDict(toDict(ast))).toEqual(ast);
    expect(parse(toQueryString(ast))).toEqual(ast);
  });

  it("rejects a dict chain one level deeper", () => {
    let value: unknown = "w0";
    for (let i = 1; i <= MAX_QUERY_DEPTH + 1; i++) value = { "@": "NOT", match: value, no_match: `w${i}` };
    expect(dictError(value).message).toMatch(/: Query nesting too deep$/);
  });
});

describe("round trip through dict", () => {
  const queries = [
    "one",
    "^one* +two three",
    "NEAR(a b c, 2)",
    "a OR b AND c NOT d",
    "-{x y}:(a OR b)",
    "a AND {cola colb}:({cold}: string AND -x:NEAR(seven eight))",
    '"$!Tokens~a|b>c" OR "one""two"',
  ];

  for (const query of queries) {
    it(`fromDict(toDict(q)) equals q for ${query}`, () => {
      const ast = parse(query);
      expect(fromDict(toDict(ast))).toEqual(ast);
    });

    it(`survives JSON for ${query}`, () => {
      const ast = parse(query);
      expect(toQueryString(fromDict(JSON.parse(JSON.stringify(toDict(ast)))))).toBe(toQueryString(ast));
    });
  }
});
