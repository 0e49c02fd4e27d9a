import { DEFAULT_CONFIG, QUERY_PRESETS } from "@/config/presets";
import { foldCase, normalizeLine, normalizeToken } from "@/lib/pipeline/normalize";
import type { NormalizerConfig } from "@/lib/types";

describe("foldCase", () => {
  it("lowercases ASCII letters only", () => {
    expect(foldCase("TNF-Alpha2")).toBe("tnf-alpha2");
    expect(foldCase("ÄB")).toBe("Äb");
  });
});

describe("normalizeToken", () => {
  const hyphenGreek: NormalizerConfig = {
    breakPoint: "delimiter",
    recombine: "hyphen",
    greekNormalize: true,
    stemmer: "none",
  };

  it("splits, lowercases, maps Greek letter runs and hyphen-joins", () => {
    expect(normalizeToken("TNF-alpha2", hyphenGreek)).toBe("tnf-a2");
  });

  it("keeps Greek names when Greek normalization is off", () => {
    expect(normalizeToken("TNF-alpha2", { ...hyphenGreek, greekNormalize: false })).toBe(
      "tnf-alpha2",
    );
  });

  it("joins symbolic tokens into one term", () => {
    expect(normalizeToken("TNF-alpha", QUERY_PRESETS.symbolic)).toBe("tnfa");
    expect(normalizeToken("NF-kappa-B", QUERY_PRESETS.symbolic)).toBe("nfkb");
    expect(normalizeToken("NF-kappaB", QUERY_PRESETS.symbolic)).toBe("nfkappab");
  });

  it("splits by word class before Greek normalization", () => {
    const config: NormalizerConfig = { ...QUERY_PRESETS.symbolic, breakPoint: "wordClass" };
    expect(normalizeToken("NF-kappaB", config)).toBe("nfkb");
    expect(normalizeToken("TNFalpha2", config)).toBe("tnfa2");
  });

  it("returns the whole lowercased token without break points", () => {
    const config: NormalizerConfig = {
      breakPoint: "none",
      recombine: "concat",
      greekNormalize: false,
      stemmer: "none",
    };
    expect(normalizeToken("IL-2R", config)).toBe("il-2r");
  });
});

describe("normalizeLine", () => {
  it("stems every sub-token under the verbose defaults", () => {
    expect(
      normalizeLine("Tumor necrosis factors (TNF-alpha) regulate cells.", DEFAULT_CONFIG),
    ).toBe("tumor necrosi factor tnf alpha regul cell");
  });

  it("drops tokens that normalize to nothing", () => {
    const config: NormalizerConfig = {
      breakPoint: "delimiter",
      recombine: "space",
      greekNormalize: false,
      stemmer: "none",
    };
    expect(normalizeLine("IL-2 --- ok", config)).toBe("il 2 ok");
  });

  it("returns an empty string for a line without tokens", () => {
    expect(normalizeLine("  ", DEFAULT_CONFIG)).toBe("");
  });
});
