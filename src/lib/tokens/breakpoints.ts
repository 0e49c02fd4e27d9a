import type { BreakPointPolicy } from "@/lib/types";

interface Span {
  start: number;
  end: number;
}

const NON_DELIMITER_RUN = /[^()[\]\-_/]+/g;
const ALNUM_RUN = /[A-Za-z0-9]+/g;

const isUpper = (ch: string | undefined) => ch !== undefined && ch >= "A" && ch <= "Z";
const isLower = (ch: string | undefined) => ch !== undefined && ch >= "a" && ch <= "z";
const isDigit = (ch: string | undefined) => ch !== undefined && ch >= "0" && ch <= "9";

function runLength(token: string, from: number, test: (ch: string | undefined) => boolean) {
  let end = from;
  while (test(token[end])) end += 1;
  return end - from;
}

// Sub-token classes in priority order; each returns the match length at `at`, 0 for none.
const WORD_CLASSES: ReadonlyArray<(token: string, at: number) => number> = [
  (token, at) => {
    if (!isUpper(token[at])) return 0;
    const lower = runLength(token, at + 1, isLower);
    return lower > 0 ? lower + 1 : 0;
  },
  (token, at) => runLength(token, at, isUpper),
  (token, at) => runLength(token, at, isLower),
  (token, at) => runLength(token, at, isDigit),
];

function regexSpans(token: string, pattern: RegExp): Span[] {
  return Array.from(token.matchAll(pattern), (match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

function wordClassSpans(token: string): Span[] {
  const spans: Span[] = [];
  let at = 0;
  while (at < token.length) {
    let length = 0;
    for (const matchClass of WORD_CLASSES) {
      length = matchClass(token, at);
      if (length > 0) break;
    }
    if (length > 0) {
      spans.push({ start: at, end: at + length });
      at += length;
    } else {
      at += 1;
    }
  }
  return spans;
}

function spansFor(token: string, policy: BreakPointPolicy): Span[] {
  switch (policy) {
    case "none":
      return [{ start: 0, end: token.length }];
    case "delimiter":
      return regexSpans(token, NON_DELIMITER_RUN);
    case "alnum":
      return regexSpans(token, ALNUM_RUN);
    case "wordClass":
      return wordClassSpans(token);
  }
}

/** Splits a raw token into ordered sub-tokens under the given break-point policy. */
export function extractSubtokens(token: string, policy: BreakPointPolicy): string[] {
  return spansFor(token, policy).map(({ start, end }) => token.slice(start, end));
}

/** Characters of `token` that no sub-token kept, in their original order. */
export function droppedCharacters(token: string, policy: BreakPointPolicy): string[] {
  const dropped: string[] = [];
  let cursor = 0;
  for (const { start, end } of spansFor(token, policy)) {
    dropped.push(...token.slice(cursor, start));
    cursor = end;
  }
  dropped.push(...token.slice(cursor));
  return dropped;
}
