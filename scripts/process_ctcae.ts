import fs from "node:fs";
import path from "node:path";
import minimist from "minimist";

import { DEFAULT_CTCAE_VERSION, parseCtcaeSource } from "../ml/terms/ctcae_source";

async function run() {
  const args = minimist(process.argv.slice(2), {
    string: ["in", "out", "version"],
    default: {
      in: path.join("data", "CTCAE_v5.0.xlsx"),
      out: path.join("data", "ctcae_processed.json"),
      version: DEFAULT_CTCAE_VERSION,
    },
  });

  const inputPath = path.resolve(String(args.in));
  if (!fs.existsSync(inputPath)) {
    throw new Error(`CTCAE source not found at ${inputPath}`);
  }

  console.log(`Processing CTCAE data from ${inputPath}...`);
  const document = await parseCtcaeSource(inputPath, fs.readFileSync(inputPath), String(args.version));

  const outputPath = path.resolve(String(args.out));
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${JSON.stringify(document, null, 2)}\n`);
  console.log(
    JSON.stringify(
      { ok: true, terms: document.terms.length, categories: document.categories.length, out: outputPath },
      null,
      2
    )
  );
}

run().catch((error) => {
  console.error(error);
  process.exit(1);
});
