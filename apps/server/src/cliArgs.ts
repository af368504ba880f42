import { resolve } from "node:path";
import { parseArgs } from "node:util";
import type { RunInput } from "./types/run.js";

export function parseCliArgs(argv: string[]): RunInput {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      reclassify: { type: "boolean", default: false },
      "skip-text-reading": { type: "boolean", default: false }
    },
    strict: true
  });

  if (!values.input || !values.output) {
    throw new Error("Both --input and --output are required");
  }
  return {
    inputFolder: resolve(values.input),
    outputFolder: resolve(values.output),
    reclassify: values.reclassify ?? false,
    skipTextReading: values["skip-text-reading"] ?? false
  };
}
