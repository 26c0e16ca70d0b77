// services/runBomPipeline.ts
import pLimit from "p-limit";
import type { ConsolidatedLineItem } from "../types.js";
import type { BomSession } from "./bomSession.js";
import type { CatalogClient, KeywordSearchOptions } from "./catalogService.js";
import type { RankingOptions } from "./rankCandidates.js";
import { suggestKeyword } from "./keywordService.js";
import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/guards.js";

const DEFAULT_CONCURRENCY = 4;

// One call covers every line item that needs a keyword search.
export interface KeywordSource {
  generateBatch(lineItems: readonly ConsolidatedLineItem[]): Promise<Map<number, string>>;
}

export interface PipelineOptions {
  catalog: CatalogClient;
  keywords?: KeywordSource;
  ranking?: RankingOptions;
  search?: KeywordSearchOptions;
  concurrency?: number;
}

export type SearchStrategy = "mpn" | "keyword" | "none";

export interface LineItemOutcome {
  lineItemId: number;
  strategy: SearchStrategy;
  query: string | null;
  found: number;
  ranked: number;
  skipped: number;
  topCandidateId: string | null;
}

export interface PipelineFailure {
  lineItemId: number;
  error: string;
}

export interface PipelineReport {
  outcomes: LineItemOutcome[];
  failures: PipelineFailure[];
}

interface SearchState {
  item: ConsolidatedLineItem;
  strategy: SearchStrategy;
  query: string | null;
  raws: unknown[];
}

async function searchByMpn(item: ConsolidatedLineItem, catalog: CatalogClient): Promise<SearchState> {
  const mpn = item.fields.mpn;
  if (!mpn) return { item, strategy: "none", query: null, raws: [] };
  return { item, strategy: "mpn", query: mpn, raws: await catalog.searchByMpn(mpn) };
}

async function keywordsFor(
  items: readonly ConsolidatedLineItem[],
  source: KeywordSource | undefined
): Promise<Map<number, string>> {
  if (!source || items.length === 0) return new Map();
  try {
    return await source.generateBatch(items);
  } catch (err) {
    logger.warn("[pipeline] keyword batch failed; using fallback keywords", { error: errorMessage(err) });
    return new Map();
  }
}

function finish(session: BomSession, state: SearchState, options: PipelineOptions): LineItemOutcome {
  const { item, strategy, query, raws } = state;
  const ranked = session.setCandidates(item.id, raws, options.ranking);

  return {
    lineItemId: item.id,
    strategy,
    query,
    found: raws.length,
    ranked: ranked.length,
    skipped: session.skippedCandidates(item.id).length,
    topCandidateId: ranked[0]?.candidateId ?? null
  };
}

/**
 * Fetches, normalizes and ranks candidates for every line item of the
 * session. A failing line item is reported and the rest keep going.
 */
export async function runBomPipeline(session: BomSession, options: PipelineOptions): Promise<PipelineReport> {
  const { catalog } = options;
  const items = session.lineItems();
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY)));

  const outcomes: (LineItemOutcome | null)[] = items.map(() => null);
  const failures: (PipelineFailure | null)[] = items.map(() => null);

  const fail = (index: number, err: unknown) => {
    const item = items[index];
    logger.error("[pipeline] line item failed", err, { lineItemId: item.id });
    failures[index] = { lineItemId: item.id, error: errorMessage(err) };
  };

  // 1. EXACT MPN SEARCH
  const states = await Promise.all(
    items.map((item, index) =>
      limit(async () => {
        try {
          return await searchByMpn(item, catalog);
        } catch (err) {
          fail(index, err);
          return null;
        }
      })
    )
  );

  // 2. KEYWORDS FOR EVERY ITEM THE MPN SEARCH LEFT EMPTY
  const needsKeyword = states.filter((s): s is SearchState => s !== null && s.raws.length === 0);
  const generated = await keywordsFor(needsKeyword.map(s => s.item), options.keywords);

  // 3. KEYWORD SEARCH, NORMALIZE + RANK
  await Promise.all(
    states.map((found, index) => {
      if (!found) return undefined;
      const state = found;
      return limit(async () => {
        try {
          if (state.raws.length === 0) {
            const keyword = generated.get(state.item.id) || suggestKeyword(state.item);
            if (keyword) {
              state.strategy = "keyword";
              state.query = keyword;
              state.raws = await catalog.searchKeyword(keyword, options.search);
            }
          }
          outcomes[index] = finish(session, state, options);
        } catch (err) {
          fail(index, err);
        }
      });
    })
  );

  const report: PipelineReport = {
    outcomes: outcomes.filter((o): o is LineItemOutcome => o !== null),
    failures: failures.filter((f): f is PipelineFailure => f !== null)
  };

  logger.info("[pipeline] BOM search finished", {
    lineItems: items.length,
    ranked: report.outcomes.filter(o => o.ranked > 0).length,
    failures: report.failures.length
  });

  return report;
}
