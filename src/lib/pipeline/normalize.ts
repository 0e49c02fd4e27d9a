import { normalizeGreek } from "@/lib/text/greek";
import { extractSubtokens } from "@/lib/tokens/breakpoints";
import { tokenizeLine } from "@/lib/tokens/cleanup";
import { recombine } from "@/lib/tokens/recombine";
import type { NormalizerConfig } from "@/lib/types";

// ASCII only; other characters pass through untouched
export function foldCase(value: string) {
  return value.replace(/[A-Z]+/g, (run) => run.toLowerCase());
}

export function normalizeToken(raw: string, config: Readonly<NormalizerConfig>) {
  let subtokens = extractSubtokens(raw, config.breakPoint).map(foldCase);
  if (config.greekNormalize) {
    subtokens = subtokens.map(normalizeGreek);
  }
  return recombine(subtokens, config);
}

export function normalizeLineTokens(line: string, config: Readonly<NormalizerConfig>) {
  return tokenizeLine(line)
    .map((raw) => normalizeToken(raw, config))
    .filter(Boolean);
}

/** Normalizes one content line into space-separated index terms. */
export function normalizeLine(line: string, config: Readonly<NormalizerConfig>) {
  return normalizeLineTokens(line, config).join(" ");
}
