import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import minimist from "minimist";

import { loadConfig } from "../ml/config";
import { createSymptomMatcher, isMatchFailure } from "../ml/matcher";
import { formatMatchResult } from "../ml/matcher/format_result";

async function run() {
  const args = minimist(process.argv.slice(2), {
    string: ["details", "collection", "model", "output"],
    boolean: ["verbose"],
    alias: { v: "verbose" },
    default: { details: "" },
  });

  const symptom = args._.join(" ").trim();
  if (!symptom) {
    throw new Error('Usage: run_symptom_matcher "<symptom>" [--details ...] [--model ...] [--collection ...] [--output file] [--verbose]');
  }

  const config = loadConfig({
    overrides: {
      log_level: args.verbose ? "info" : "warn",
      ...(args.model ? { model: String(args.model) } : {}),
      ...(args.collection ? { collection_name: String(args.collection) } : {}),
    },
  });
  const matcher = createSymptomMatcher(config);

  console.log(`Processing symptom: ${symptom}`);
  const result = await matcher.match(symptom, String(args.details));
  console.log("\nResult:");
  for (const line of formatMatchResult(result, Boolean(args.verbose))) {
    console.log(line);
  }

  if (args.output) {
    const outputPath = path.resolve(String(args.output));
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, `${JSON.stringify(result, null, 2)}\n`);
    console.log(`\nResult saved to ${outputPath}`);
  }

  if (isMatchFailure(result)) {
    process.exitCode = 1;
  }
}

run().catch((error) => {
  console.error(error);
  process.exit(1);
});
