#!/usr/bin/env tsx
import "dotenv/config";

import { normalizeFile } from "@/lib/document";
import { ConfigError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { USAGE, resolveJob } from "@/lib/options";

function readJob(argv: string[]) {
  try {
    return resolveJob(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${error.message}\n${USAGE}`);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const job = readJob(process.argv.slice(2));
  if (!job) {
    console.error(USAGE);
    return;
  }

  try {
    await normalizeFile(job);
  } catch (error) {
    logger.error(
      { input: job.input, output: job.output, error: error instanceof Error ? error.message : String(error) },
      "TOKENIZE_FAILED",
    );
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
