/**
 * Unit tests for keyword normalization
 */

import { describe, it, expect } from "vitest";
import { codePointLength, splitWords, stripToken, tokenize } from "./tokenize.js";

describe("tokenize", () => {
  it("should lowercase, strip punctuation and drop short tokens", () => {
    expect(tokenize("The Quick, brown FOX!")).toEqual(["quick", "brown"]);
  });

  it("should strip brackets and quotes from both ends only", () => {
    expect(tokenize('"(hello)" world... don\'t')).toEqual(["hello", "world", "don't"]);
  });

  it("should apply the length filter after stripping", () => {
    expect(tokenize("'abc' (abcd)")).toEqual(["abcd"]);
  });

  it("should keep repeated words", () => {
    expect(tokenize("data data\tdata")).toEqual(["data", "data", "data"]);
  });

  it("should count code points, not UTF-16 units", () => {
    expect(tokenize("café naïf été")).toEqual(["café", "naïf"]);
    expect(codePointLength("😀😀😀")).toBe(3);
    expect(tokenize("😀😀😀")).toEqual([]);
  });

  it("should return nothing for a query without long tokens", () => {
    expect(tokenize("a is it")).toEqual([]);
    expect(tokenize("")).toEqual([]);
  });
});

describe("stripToken", () => {
  it("should remove only leading and trailing strip characters", () => {
    expect(stripToken("{[state]}")).toBe("state");
    expect(stripToken("e.g.")).toBe("e.g");
    expect(stripToken("...")).toBe("");
  });
});

describe("splitWords", () => {
  it("should split on any whitespace run", () => {
    expect(splitWords("  alpha\n\tbeta   gamma ")).toEqual(["alpha", "beta", "gamma"]);
  });
});
