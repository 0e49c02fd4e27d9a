import { cleanupLine, splitTokens, tokenizeLine } from "@/lib/tokens/cleanup";

describe("cleanupLine", () => {
  it("pads the line and blanks out non-functional symbols", () => {
    expect(cleanupLine("a!b")).toBe(" a b ");
    expect(cleanupLine("x=y")).toBe(" x y ");
  });
});

describe("tokenizeLine", () => {
  it("splits on symbols instead of fusing their neighbours", () => {
    expect(tokenizeLine("IL-2#3")).toEqual(["IL-2", "3"]);
  });

  it("drops sentence punctuation before a space", () => {
    expect(tokenizeLine("Hello, world.")).toEqual(["Hello", "world"]);
    expect(tokenizeLine("p53.1 binds")).toEqual(["p53.1", "binds"]);
  });

  it("unwraps bracketed words", () => {
    expect(tokenizeLine("the (IL-2) receptor")).toEqual(["the", "IL-2", "receptor"]);
    expect(tokenizeLine("the [IL-2] receptor")).toEqual(["the", "IL-2", "receptor"]);
    expect(tokenizeLine("x ([a]) y")).toEqual(["x", "a", "y"]);
  });

  it("drops punctuation exposed by unwrapping", () => {
    expect(tokenizeLine("(p53.) binds")).toEqual(["p53", "binds"]);
  });

  it("removes quotes and contraction fragments", () => {
    expect(tokenizeLine("Crohn's disease")).toEqual(["Crohn", "disease"]);
    expect(tokenizeLine("don't 'quote'")).toEqual(["don", "quote'"]);
    expect(tokenizeLine("``tick`` mark")).toEqual(["``tick`", "mark"]);
  });

  it("collapses trailing slashes", () => {
    expect(tokenizeLine("and/or / either//")).toEqual(["and/or", "either"]);
  });

  it("returns no tokens for a blank line", () => {
    expect(tokenizeLine("")).toEqual([]);
    expect(tokenizeLine("   \t ")).toEqual([]);
    expect(tokenizeLine("?!")).toEqual([]);
  });
});

describe("splitTokens", () => {
  it("splits on runs of whitespace", () => {
    expect(splitTokens("  a \t b\fc  ")).toEqual(["a", "b", "c"]);
  });
});
