// Usage: npm run bom -- <bom.xlsx|csv> [--search] [--in-stock] [--out <dir>]
import { parseArgs } from "node:util";
import { readBomTable, exportToExcel } from "../services/excelService.js";
import { BomSession } from "../services/bomSession.js";
import { createMouserClient } from "../services/catalogService.js";
import { createGeminiModel, createKeywordGenerator } from "../services/keywordService.js";
import { runBomPipeline } from "../services/runBomPipeline.js";
import { loadConfig } from "../lib/config.js";
import { logger } from "../lib/logger.js";

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      search: { type: "boolean", default: false },
      "in-stock": { type: "boolean", default: false },
      out: { type: "string" }
    }
  });

  const file = positionals[0];
  if (!file) {
    throw new Error("Usage: consolidateBom <bom.xlsx|csv> [--search] [--in-stock] [--out <dir>]");
  }

  const { headers, rows } = await readBomTable(file);
  const session = BomSession.fromTable(headers, rows);

  if (!values.search) {
    console.dir({ issues: session.issues, lineItems: session.lineItems() }, { depth: null });
    return;
  }

  const config = loadConfig();
  const catalog = createMouserClient({ apiKey: config.mouserApiKey });
  const keywords = config.geminiApiKey
    ? createKeywordGenerator({
        model: createGeminiModel({ apiKey: config.geminiApiKey, model: config.geminiModel })
      })
    : undefined;

  const report = await runBomPipeline(session, {
    catalog,
    keywords,
    search: { inStockOnly: values["in-stock"] }
  });

  // Take the top-ranked candidate for every line item that has one.
  for (const outcome of report.outcomes) {
    if (outcome.topCandidateId) session.selectCandidate(outcome.lineItemId, outcome.topCandidateId);
  }

  console.dir(report, { depth: null });

  if (values.out) {
    const filePath = await exportToExcel(session.exportRows(), values.out);
    logger.info(`[bom] export written to ${filePath}`);
  }
}

main().catch(err => {
  logger.error("[bom] run failed", err);
  process.exitCode = 1;
});
