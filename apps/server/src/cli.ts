#!/usr/bin/env node
/**
 * Sort a folder of bale photos into category directories.
 *
 * Usage:
 *   bale-sorter --input <dir> --output <dir> [--reclassify] [--skip-text-reading]
 *
 * Options:
 *   --input              Folder holding the source photos
 *   --output             Output root; the per-image cache lives in <output>/json
 *   --reclassify         Re-decide classes from cached labels with the current rules
 *   --skip-text-reading  Do not call the VLM for this run
 */

import pino from "pino";
import { buildPipelineService } from "./bootstrap.js";
import { parseCliArgs } from "./cliArgs.js";
import { env } from "./config/env.js";
import { isPipelineError } from "./services/pipelineError.js";

const logger = pino({ name: "cli", level: env.LOG_LEVEL });

async function main() {
  const input = parseCliArgs(process.argv.slice(2));
  const pipelineService = await buildPipelineService(env);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\nInterrupted; finishing in-flight images. Re-run to resume.");
    controller.abort();
  });

  const summary = await pipelineService.runPipeline(
    input,
    {
      onStageChanged: (stage) => console.log(`=== ${stage} ===`),
      onProgress: (current, total, message) => console.log(`[${current}/${total}] ${message}`)
    },
    controller.signal
  );

  console.log();
  for (const stage of summary.stages) {
    console.log(
      `${stage.stage}: ${stage.processed} processed, ${stage.cached} cached, ${stage.skipped} skipped, ${stage.failures.length} failed`
    );
  }
  if (summary.aborted) {
    process.exitCode = 130;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error, code: isPipelineError(error) ? error.code : undefined }, "Run failed");
  process.exitCode = 1;
});
