import fs from "node:fs";
import readline from "node:readline";
import { once } from "node:events";
import { pipeline } from "node:stream/promises";

import { logger } from "@/lib/logger";
import { normalizeLineTokens } from "@/lib/pipeline/normalize";
import type { NormalizerConfig, TokenizeSummary } from "@/lib/types";

const MARKUP_PREFIXES = ["<DOCNO", "<DOC>", "</DOC>", "<TITLE", "</TITLE>", "<TEXT", "</TEXT>"];

/** Document markup lines (Lemur/Indri trectext) are copied through untouched. */
export function isMarkupLine(line: string) {
  return MARKUP_PREFIXES.some((prefix) => line.startsWith(prefix));
}

export interface ProcessedLine {
  text: string;
  markup: boolean;
  tokens: number;
}

export function processLine(line: string, config: Readonly<NormalizerConfig>): ProcessedLine {
  if (isMarkupLine(line)) {
    return { text: line, markup: true, tokens: 0 };
  }
  const tokens = normalizeLineTokens(line, config);
  return { text: tokens.join(" "), markup: false, tokens: tokens.length };
}

export function* processLines(
  lines: Iterable<string>,
  config: Readonly<NormalizerConfig>,
): Generator<string> {
  for (const line of lines) {
    yield processLine(line, config).text;
  }
}

export async function normalizeFile(options: {
  input: string;
  output: string;
  config: Readonly<NormalizerConfig>;
}): Promise<TokenizeSummary> {
  const startTime = Date.now();
  const { input, output, config } = options;
  logger.debug({ input, output, config }, "TOKENIZE_START");

  // latin1 maps every byte to one code unit, so bytes outside ASCII pass through unchanged
  const source = fs.createReadStream(input, { encoding: "latin1" });
  // a missing input must fail before the output file is created
  await once(source, "open");

  const summary: TokenizeSummary = { lines: 0, markupLines: 0, tokens: 0, durationMs: 0 };

  await pipeline(
    readline.createInterface({ input: source, crlfDelay: Infinity }),
    async function* (lines: AsyncIterable<string>) {
      for await (const line of lines) {
        const processed = processLine(line, config);
        summary.lines += 1;
        summary.tokens += processed.tokens;
        if (processed.markup) summary.markupLines += 1;
        yield `${processed.text}\n`;
      }
    },
    fs.createWriteStream(output, { encoding: "latin1" }),
  );

  summary.durationMs = Date.now() - startTime;
  logger.info({ input, output, ...summary }, "TOKENIZE_COMPLETE");
  return summary;
}
