import { recombine } from "@/lib/tokens/recombine";
import type { NormalizerConfig } from "@/lib/types";

const base: NormalizerConfig = {
  breakPoint: "delimiter",
  recombine: "space",
  greekNormalize: false,
  stemmer: "sstem",
};

describe("recombine", () => {
  const subtokens = ["kinases", "cells"];

  it("stems only the first sub-token as a whole without break points", () => {
    expect(recombine(["cells"], { ...base, breakPoint: "none" })).toBe("cell");
    expect(recombine(["cells"], { ...base, breakPoint: "none", recombine: "hyphen" })).toBe("cell");
  });

  it("hyphen-joins and then stems the whole token", () => {
    expect(recombine(subtokens, { ...base, recombine: "hyphen" })).toBe("kinases-cell");
  });

  it("stems each sub-token and joins with spaces without restemming", () => {
    expect(recombine(subtokens, { ...base, recombine: "space" })).toBe("kinase cell");
  });

  it("concatenates and then stems the whole token", () => {
    expect(recombine(subtokens, { ...base, recombine: "concat" })).toBe("kinasescell");
  });

  it("joins without stemming when no stemmer is set", () => {
    const config: NormalizerConfig = { ...base, stemmer: "none" };
    expect(recombine(subtokens, { ...config, recombine: "hyphen" })).toBe("kinases-cells");
    expect(recombine(subtokens, { ...config, recombine: "space" })).toBe("kinases cells");
    expect(recombine(subtokens, { ...config, recombine: "concat" })).toBe("kinasescells");
    expect(recombine(subtokens, { ...config, breakPoint: "none" })).toBe("kinases");
  });

  it("returns an empty token for an empty sub-token list", () => {
    expect(recombine([], { ...base, recombine: "hyphen" })).toBe("");
    expect(recombine([], { ...base, recombine: "space" })).toBe("");
  });

  it("applies the configured stemmer to the whole hyphenated token", () => {
    expect(recombine(["tnf", "alpha"], { ...base, recombine: "hyphen", stemmer: "porter" })).toBe(
      "tnf-alpha",
    );
    expect(recombine(["hopping", "cells"], { ...base, recombine: "hyphen", stemmer: "porter" })).toBe(
      "hopping-cel",
    );
  });
});
