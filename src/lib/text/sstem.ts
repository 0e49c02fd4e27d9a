/**
 * The "S" stemmer: strips plural endings only. The `ies`/`es` rewrites are
 * unanchored and act on the first occurrence in the word.
 */
export function sStem(word: string): string {
  if (word.endsWith("ies")) {
    return word.replace(/^ies$/, "y").replace(/([^ea])ies/, "$1y");
  }
  if (word.endsWith("es")) {
    return word.replace(/^es/, "e").replace(/([^aeo])es/, "$1e");
  }
  if (word.endsWith("s")) {
    return word.replace(/([^us])s$/, "$1");
  }
  return word;
}
