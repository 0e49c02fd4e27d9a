import {
  BREAK_POINT_FLAGS,
  DEFAULT_CONFIG,
  NORMALIZATION_FLAGS,
  QUERY_PRESETS,
  QUERY_TYPE_FLAGS,
  STEMMER_FLAGS,
} from "@/config/presets";
import { ConfigError } from "@/lib/errors";
import type { NormalizerConfig } from "@/lib/types";

export interface CliOptions {
  help: boolean;
  input?: string;
  output?: string;
  queryType?: string;
  breakPoint?: string;
  normalization?: string;
  greek: boolean;
  stemmer?: string;
}

export interface TokenizeJob {
  input: string;
  output: string;
  config: Readonly<NormalizerConfig>;
}

export const USAGE = [
  "Usage: tokenize -i input -o output [-h] [-t <S|V>] [-b <0|1|2|3>] [-n <h|s|j>] [-g] [-s <p|l|s>]",
  "\t-i: input",
  "\t-o: output",
  "\t-h: help information",
  "\t-t: query type [S|V]",
  "\t-b: break point set [0|1|2|3]",
  "\t-n: break point normalization method [h|s|j]",
  "\t-g: Greek alphabet normalization [on|off]",
  "\t-s: stemming method [p(orter)|l(ovins)|s]",
].join("\n");

type ValueOption = "input" | "output" | "queryType" | "breakPoint" | "normalization" | "stemmer";

const VALUE_FLAGS: Readonly<Record<string, ValueOption>> = {
  i: "input",
  o: "output",
  t: "queryType",
  b: "breakPoint",
  n: "normalization",
  s: "stemmer",
};

/**
 * Reads single-letter options. Switches may be bundled (`-gh`); an option
 * that takes a value reads the rest of its argument (`-b1`) or the next
 * argument (`-b 1`).
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, greek: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("-") || arg.length < 2) {
      throw new ConfigError(`Unexpected argument "${arg}"`);
    }

    for (let pos = 1; pos < arg.length; pos += 1) {
      const flag = arg[pos];
      if (flag === "h") {
        options.help = true;
        continue;
      }
      if (flag === "g") {
        options.greek = true;
        continue;
      }

      const key = VALUE_FLAGS[flag];
      if (!key) {
        throw new ConfigError(`Unknown option "-${flag}"`);
      }

      const attached = arg.slice(pos + 1);
      if (attached) {
        options[key] = attached;
      } else if (i + 1 < argv.length) {
        i += 1;
        options[key] = argv[i];
      } else {
        throw new ConfigError(`Option "-${flag}" requires a value`);
      }
      break;
    }
  }

  return options;
}

function lookup<T>(table: Readonly<Record<string, T>>, value: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, value) ? table[value] : undefined;
}

/** Derives the normalizer configuration from the command line. A query type wins over every other setting. */
export function resolveConfig(options: CliOptions): Readonly<NormalizerConfig> {
  if (options.queryType !== undefined) {
    const queryType = lookup(QUERY_TYPE_FLAGS, options.queryType);
    if (!queryType) {
      throw new ConfigError("The query type must be S(Symbolic) or V(Verbose)!");
    }
    return QUERY_PRESETS[queryType];
  }

  if (options.breakPoint === undefined) {
    return DEFAULT_CONFIG;
  }

  const breakPoint = lookup(BREAK_POINT_FLAGS, options.breakPoint);
  if (!breakPoint) {
    throw new ConfigError("The break point set must be 0, 1, 2 or 3!");
  }

  if (breakPoint === "none") {
    return { breakPoint, recombine: "concat", greekNormalize: false, stemmer: "none" };
  }

  if (options.normalization === undefined) {
    throw new ConfigError(
      "If the break point set is not 0, a normalization method must be specified!",
    );
  }
  const recombine = lookup(NORMALIZATION_FLAGS, options.normalization);
  if (!recombine) {
    throw new ConfigError("The normalization method must be 'h', 's' or 'j'!");
  }

  let stemmer: NormalizerConfig["stemmer"] = "none";
  if (options.stemmer !== undefined) {
    const chosen = lookup(STEMMER_FLAGS, options.stemmer);
    if (!chosen) {
      throw new ConfigError("The stemming method must be 'p', 'l' or 's'!");
    }
    stemmer = chosen;
  }

  return { breakPoint, recombine, greekNormalize: options.greek, stemmer };
}

/** Validates a full command line into a job. Returns null when only help was asked for. */
export function resolveJob(argv: readonly string[]): TokenizeJob | null {
  const options = parseArgs(argv);
  if (options.help) return null;
  if (!options.input || !options.output) {
    throw new ConfigError("Both an input (-i) and an output (-o) file must be given!");
  }
  return { input: options.input, output: options.output, config: resolveConfig(options) };
}
