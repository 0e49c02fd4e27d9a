// Applied in order to the space-padded line; each match becomes one space.
const CLEANUP_RULES: Array<[RegExp, string]> = [
  [/[!"#$%&*<=>?@\\|~]/g, " "],
  [/[.:;,] /g, " "],
  [/ \(([^)]*)\) /g, " $1 "],
  [/ \[([^)]*)\] /g, " $1 "],
  // second pass unwraps one level of nesting
  [/ \(([^)]*)\) /g, " $1 "],
  [/ \[([^)]*)\] /g, " $1 "],
  [/ '/g, " "],
  [/` /g, " "],
  [/'[st] /g, " "],
  // punctuation exposed by the bracket rules
  [/[.:;,] /g, " "],
  [/\/+ /g, " "],
];

const WHITESPACE = /[ \t\n\r\f\v]+/;

export function cleanupLine(line: string) {
  let padded = ` ${line} `;
  for (const [pattern, replacement] of CLEANUP_RULES) {
    padded = padded.replace(pattern, replacement);
  }
  return padded;
}

export function splitTokens(cleaned: string): string[] {
  const trimmed = cleaned.replace(/^[ \t\n\r\f\v]+/, "").replace(/[ \t\n\r\f\v]+$/, "");
  if (!trimmed) return [];
  return trimmed.split(WHITESPACE);
}

export function tokenizeLine(line: string) {
  return splitTokens(cleanupLine(line));
}
