#!/usr/bin/env node
import fs from "fs";
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { EyemapGenerator } from "./eyemap_generator.js";
import { parseGridRequest } from "./request_schema.js";

async function main() {
  const [requestPath, configPath] = process.argv.slice(2);
  if (!requestPath) {
    console.error("Usage: eyemap <request.json> [config.yaml]");
    process.exit(1);
  }
  const config = loadConfig(configPath);
  const request = parseGridRequest(JSON.parse(fs.readFileSync(requestPath, "utf8")));
  if (!request.ok) {
    console.error(`${request.error.field}: ${request.error.message}`);
    process.exit(1);
  }
  const generator = EyemapGenerator.fromConfig(config);
  const result = await generator.generate(request.value);
  for (const w of result.warnings) console.error(`warning: ${w}`);
  if (!result.success) {
    console.error(result.errorMessage ?? "eyemap generation failed");
    process.exit(1);
  }
  const summary = request.value.saveToFiles
    ? result.regionGrids
    : Object.fromEntries(Object.entries(result.regionGrids).map(([k, v]) => [k, Object.keys(v)]));
  process.stdout.write(
    JSON.stringify({ processing_time: result.processingTime, region_grids: summary, warnings: result.warnings }, null, 2) + "\n",
  );
}

main().catch((e) => {
  console.error(describeError(e));
  process.exit(1);
});
