import type {
  BreakPointPolicy,
  NormalizerConfig,
  QueryType,
  RecombineMode,
  StemmerKind,
} from "@/lib/types";

export const QUERY_PRESETS: Readonly<Record<QueryType, Readonly<NormalizerConfig>>> = Object.freeze({
  // gene/protein symbols only
  symbolic: Object.freeze({
    breakPoint: "delimiter",
    recombine: "concat",
    greekNormalize: true,
    stemmer: "none",
  }),
  // full gene names mixed with ordinary English
  verbose: Object.freeze({
    breakPoint: "delimiter",
    recombine: "space",
    greekNormalize: false,
    stemmer: "porter",
  }),
});

export const DEFAULT_CONFIG: Readonly<NormalizerConfig> = QUERY_PRESETS.verbose;

export const QUERY_TYPE_FLAGS: Readonly<Record<string, QueryType>> = Object.freeze({
  S: "symbolic",
  V: "verbose",
});

export const BREAK_POINT_FLAGS: Readonly<Record<string, BreakPointPolicy>> = Object.freeze({
  "0": "none",
  "1": "delimiter",
  "2": "alnum",
  "3": "wordClass",
});

export const NORMALIZATION_FLAGS: Readonly<Record<string, RecombineMode>> = Object.freeze({
  h: "hyphen",
  s: "space",
  j: "concat",
});

export const STEMMER_FLAGS: Readonly<Record<string, Exclude<StemmerKind, "none">>> = Object.freeze({
  p: "porter",
  l: "lovins",
  s: "sstem",
});
