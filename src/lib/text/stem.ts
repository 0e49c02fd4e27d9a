import { lovinsStem } from "@/lib/text/lovins";
import { porterStem } from "@/lib/text/porter";
import { sStem } from "@/lib/text/sstem";
import type { Stemmer, StemmerKind } from "@/lib/types";

const identity: Stemmer = (word) => word;

const STEMMERS: Readonly<Record<StemmerKind, Stemmer>> = {
  none: identity,
  porter: porterStem,
  lovins: lovinsStem,
  sstem: sStem,
};

export function resolveStemmer(kind: StemmerKind): Stemmer {
  return STEMMERS[kind];
}

export function stemTokens(tokens: readonly string[], kind: StemmerKind) {
  const stem = STEMMERS[kind];
  return tokens.map((token) => stem(token));
}
