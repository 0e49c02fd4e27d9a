import { resolveStemmer, stemTokens } from "@/lib/text/stem";
import type { NormalizerConfig } from "@/lib/types";

/**
 * Reassembles normalized sub-tokens into the emitted token text.
 *
 * | breakPoint | recombine | join                        | whole-token stem |
 * |------------|-----------|-----------------------------|------------------|
 * | none       | (ignored) | first sub-token             | yes              |
 * | other      | hyphen    | `-`                         | yes              |
 * | other      | space     | ` `, each sub-token stemmed | no               |
 * | other      | concat    | (nothing)                   | yes              |
 */
export function recombine(subtokens: readonly string[], config: Readonly<NormalizerConfig>): string {
  const stem = resolveStemmer(config.stemmer);

  if (config.breakPoint === "none") {
    return stem(subtokens[0] ?? "");
  }

  switch (config.recombine) {
    case "hyphen":
      return stem(subtokens.join("-"));
    case "space":
      return stemTokens(subtokens, config.stemmer).join(" ");
    case "concat":
      return stem(subtokens.join(""));
  }
}
