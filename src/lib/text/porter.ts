import { STEP2_SUFFIXES, STEP3_SUFFIXES, STEP4_SUFFIXES } from "@/config/porter";
import {
  containsVowel,
  endsWithDoubleConsonant,
  isShortSyllable,
  measure,
} from "@/lib/text/measure";

function longestSuffix(word: string, suffixes: Iterable<string>) {
  let best: string | undefined;
  for (const suffix of suffixes) {
    if (word.endsWith(suffix) && (!best || suffix.length > best.length)) {
      best = suffix;
    }
  }
  return best;
}

function replaceSuffix(
  word: string,
  table: Readonly<Record<string, string>>,
  leadingY: boolean,
) {
  const suffix = longestSuffix(word, Object.keys(table));
  if (!suffix) return word;
  const stem = word.slice(0, -suffix.length);
  return measure(stem, leadingY) > 0 ? stem + table[suffix] : word;
}

function step1(word: string, leadingY: boolean) {
  let w = word;

  if (w.endsWith("sses") || w.endsWith("ies")) {
    w = w.slice(0, -2);
  } else if (/[^s]s$/.test(w)) {
    w = w.slice(0, -1);
  }

  if (w.endsWith("eed")) {
    if (measure(w.slice(0, -3), leadingY) > 0) w = w.slice(0, -1);
  } else {
    const ending = w.endsWith("ed") ? "ed" : w.endsWith("ing") ? "ing" : "";
    const stem = ending ? w.slice(0, -ending.length) : "";
    if (ending && containsVowel(stem, leadingY)) {
      w = stem;
      if (/(at|bl|iz)$/.test(w)) {
        w += "e";
      } else if (endsWithDoubleConsonant(w)) {
        w = w.slice(0, -1);
      } else if (isShortSyllable(w)) {
        w += "e";
      }
    }
  }

  if (w.endsWith("y") && containsVowel(w.slice(0, -1), leadingY)) {
    w = `${w.slice(0, -1)}i`;
  }
  return w;
}

function step4(word: string, leadingY: boolean) {
  const suffix = longestSuffix(word, STEP4_SUFFIXES);
  if (suffix) {
    const stem = word.slice(0, -suffix.length);
    return measure(stem, leadingY) > 1 ? stem : word;
  }
  if (/[st]ion$/.test(word)) {
    const stem = word.slice(0, -3);
    return measure(stem, leadingY) > 1 ? stem : word;
  }
  return word;
}

function step5(word: string, leadingY: boolean) {
  let w = word;
  if (w.endsWith("e")) {
    const stem = w.slice(0, -1);
    const m = measure(stem, leadingY);
    if (m > 1 || (m === 1 && !isShortSyllable(stem))) w = stem;
  }
  if (w.endsWith("ll") && measure(w, leadingY) > 1) {
    w = w.slice(0, -1);
  }
  return w;
}

/**
 * Porter (1980) suffix stripping. Words shorter than three characters are
 * returned as-is. A word-initial `y` is treated as a consonant throughout.
 */
export function porterStem(word: string): string {
  if (word.length < 3) return word;
  const leadingY = word.startsWith("y");

  let w = step1(word, leadingY);
  w = replaceSuffix(w, STEP2_SUFFIXES, leadingY);
  w = replaceSuffix(w, STEP3_SUFFIXES, leadingY);
  w = step4(w, leadingY);
  return step5(w, leadingY);
}
