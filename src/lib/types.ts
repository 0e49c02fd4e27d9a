export type BreakPointPolicy = "none" | "delimiter" | "alnum" | "wordClass";

export type RecombineMode = "hyphen" | "space" | "concat";

export type StemmerKind = "none" | "porter" | "lovins" | "sstem";

export type QueryType = "symbolic" | "verbose";

export interface NormalizerConfig {
  breakPoint: BreakPointPolicy;
  /** Ignored when `breakPoint` is "none". "concat" also covers the `j` mode. */
  recombine: RecombineMode;
  greekNormalize: boolean;
  stemmer: StemmerKind;
}

export type Stemmer = (word: string) => string;

export interface TokenizeSummary {
  lines: number;
  markupLines: number;
  tokens: number;
  durationMs: number;
}

export type LovinsCondition =
  | "A"
  | "B"
  | "C"
  | "D"
  | "E"
  | "F"
  | "G"
  | "H"
  | "I"
  | "J"
  | "K"
  | "L"
  | "M"
  | "N"
  | "O"
  | "P"
  | "Q"
  | "R"
  | "S"
  | "T"
  | "U"
  | "V"
  | "W"
  | "X"
  | "Y"
  | "Z"
  | "AA"
  | "BB"
  | "CC";
