import { describe, expect, it } from "vitest";
import { BomSession } from "../services/bomSession.js";
import { runBomPipeline } from "../services/runBomPipeline.js";
import type { CatalogClient, KeywordSearchOptions } from "../services/catalogService.js";
import { mouserPart } from "./fixtures.js";

const headers = ["RefDes", "MPN", "Value", "Package", "Description"];
const rows = [
  ["R1", "RC0603FR-071KL", "1k", "0603"],
  ["C1", null, "100nF", "0402", "CAP CER"],
  ["U1", "MISSING-1"],
  ["J1", "BOOM"]
];

const capacitorPart = mouserPart({
  ManufacturerPartNumber: "CL05B104KO5NNNC",
  MouserPartNumber: "187-CL05B104KO5NNNC",
  Description: "Multilayer Ceramic Capacitors MLCC - SMD/SMT 0402 0.1uF"
});

function fakeCatalog() {
  const keywordCalls: { keyword: string; options: KeywordSearchOptions | undefined }[] = [];
  const catalog: CatalogClient = {
    async searchByMpn(mpn) {
      if (mpn === "BOOM") throw new Error("catalog down");
      return mpn === "RC0603FR-071KL" ? [mouserPart()] : [];
    },
    async searchKeyword(keyword, options) {
      keywordCalls.push({ keyword, options });
      return [capacitorPart];
    }
  };
  return { catalog, keywordCalls };
}

describe("runBomPipeline", () => {
  it("searches by MPN first and by keyword otherwise", async () => {
    const session = BomSession.fromTable(headers, rows);
    const { catalog, keywordCalls } = fakeCatalog();

    const report = await runBomPipeline(session, { catalog, concurrency: 2 });

    expect(report.outcomes).toEqual([
      {
        lineItemId: 1,
        strategy: "mpn",
        query: "RC0603FR-071KL",
        found: 1,
        ranked: 1,
        skipped: 0,
        topCandidateId: "603-RC0603FR-071KL"
      },
      {
        lineItemId: 2,
        strategy: "keyword",
        query: "100nF 0402 CAP CER",
        found: 1,
        ranked: 1,
        skipped: 0,
        topCandidateId: "187-CL05B104KO5NNNC"
      },
      {
        lineItemId: 3,
        strategy: "keyword",
        query: "MISSING-1",
        found: 1,
        ranked: 1,
        skipped: 0,
        topCandidateId: "187-CL05B104KO5NNNC"
      }
    ]);
    expect(keywordCalls.map(c => c.keyword).sort()).toEqual(["100nF 0402 CAP CER", "MISSING-1"]);
    expect(session.rankedCandidates(1).map(c => c.candidateId)).toEqual(["603-RC0603FR-071KL"]);
  });

  it("reports a failing line item and finishes the rest", async () => {
    const session = BomSession.fromTable(headers, rows);
    const { catalog } = fakeCatalog();

    const report = await runBomPipeline(session, { catalog });

    expect(report.failures).toEqual([{ lineItemId: 4, error: "catalog down" }]);
    expect(report.outcomes.map(o => o.lineItemId)).toEqual([1, 2, 3]);
    expect(session.rankedCandidates(4)).toEqual([]);
  });

  it("uses the keyword source and search options it is given", async () => {
    const session = BomSession.fromTable(headers, rows);
    const { catalog, keywordCalls } = fakeCatalog();

    const report = await runBomPipeline(session, {
      catalog,
      keywords: { generateBatch: async items => new Map(items.map(item => [item.id, `kw-${item.id}`] as const)) },
      search: { inStockOnly: true },
      concurrency: 1
    });

    expect(report.outcomes.find(o => o.lineItemId === 2)?.query).toBe("kw-2");
    expect(keywordCalls).toEqual([
      { keyword: "kw-2", options: { inStockOnly: true } },
      { keyword: "kw-3", options: { inStockOnly: true } }
    ]);
  });

  it("asks the keyword source once for every item the MPN search left empty", async () => {
    const session = BomSession.fromTable(headers, rows);
    const { catalog, keywordCalls } = fakeCatalog();
    const batches: number[][] = [];

    const report = await runBomPipeline(session, {
      catalog,
      keywords: {
        async generateBatch(items) {
          batches.push(items.map(item => item.id));
          return new Map([[2, "ceramic 100nF"]]);
        }
      },
      concurrency: 1
    });

    expect(batches).toEqual([[2, 3]]);
    expect(keywordCalls.map(c => c.keyword)).toEqual(["ceramic 100nF", "MISSING-1"]);
    expect(report.outcomes.map(o => o.query)).toEqual(["RC0603FR-071KL", "ceramic 100nF", "MISSING-1"]);
  });

  it("falls back to suggested keywords when the keyword source fails", async () => {
    const session = BomSession.fromTable(headers, rows);
    const { catalog, keywordCalls } = fakeCatalog();

    const report = await runBomPipeline(session, {
      catalog,
      keywords: {
        async generateBatch() {
          throw new Error("quota");
        }
      },
      concurrency: 1
    });

    expect(report.failures).toEqual([{ lineItemId: 4, error: "catalog down" }]);
    expect(keywordCalls.map(c => c.keyword)).toEqual(["100nF 0402 CAP CER", "MISSING-1"]);
  });

  it("applies ranking options to every line item", async () => {
    const session = BomSession.fromTable(headers, rows);
    const { catalog } = fakeCatalog();

    await runBomPipeline(session, { catalog, ranking: { excludeZeroStock: true, limit: 0 } });

    expect(session.rankedCandidates(1)).toEqual([]);
  });
});
