/**
 * Waterfall Engine Demo Script
 *
 * Run with: npx tsx demo/run-demo.ts [path/to/model.json]
 */

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import {
  WaterfallEngine,
  buildAnnualStatement,
  createSummaryReport,
  formatAnnualStatementAsText,
} from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const defaultModel = join(__dirname, "../../../testcases/waterfall_engine_v1/fixtures/three_entity_base.json");

function main(): void {
  console.log("Waterfall Engine Demo");
  console.log("=====================\n");

  const modelPath = process.argv[2] ?? defaultModel;
  const document: unknown = JSON.parse(readFileSync(modelPath, "utf8"));

  const engine = new WaterfallEngine();
  console.log(`Running ${modelPath}...\n`);
  const result = engine.run(document);

  console.log(createSummaryReport(result));

  if (!result.model) {
    process.exitCode = 1;
    return;
  }

  for (const id of result.model.entityOrder) {
    const entity = result.model.entities[id];
    if (entity) {
      console.log("");
      console.log(formatAnnualStatementAsText(buildAnnualStatement(entity)));
    }
  }

  if (!result.success) {
    process.exitCode = 1;
  }
}

main();
