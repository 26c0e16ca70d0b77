// services/rankCandidates.ts
import type {
  Candidate,
  ConsolidatedLineItem,
  LifecycleStatus,
  ScoredCandidate,
  SubScores
} from "../types.js";
import { matchPackage, type PackageMatch } from "./packageMatch.js";
import { logger } from "../lib/logger.js";

/* -----------------------------
   Constants
----------------------------- */

// Fixed so that rankings stay comparable across sessions.
export const SCORE_WEIGHTS: Readonly<SubScores> = {
  stock: 0.3,
  price: 0.5,
  lifecycle: 0.1,
  package: 0.1
};

const LIFECYCLE_SCORES: Record<LifecycleStatus, number> = {
  Active: 1.0,
  NRND: 0.4,
  Unknown: 0.3,
  Obsolete: 0.0
};

const PACKAGE_SCORES: Record<PackageMatch, number> = {
  exact: 1.0,
  equivalent: 0.5,
  none: 0.0
};

const PACKAGE_ATTRIBUTE_NAME = /package|case|footprint/i;

/* -----------------------------
   Types
----------------------------- */

export interface RankingOptions {
  allowObsolete?: boolean;
  excludeZeroStock?: boolean;
  limit?: number;
}

export type ExclusionReason = "obsolete" | "zero_stock";

export interface CandidateFilterResult {
  kept: Candidate[];
  excluded: { candidate: Candidate; reason: ExclusionReason }[];
}

/* -----------------------------
   Filtering
----------------------------- */

export function filterCandidates(
  candidates: readonly Candidate[],
  options: RankingOptions = {}
): CandidateFilterResult {
  const result: CandidateFilterResult = { kept: [], excluded: [] };

  for (const candidate of candidates) {
    if (candidate.lifecycleStatus === "Obsolete" && !options.allowObsolete) {
      result.excluded.push({ candidate, reason: "obsolete" });
    } else if (candidate.stockQuantity <= 0 && options.excludeZeroStock) {
      result.excluded.push({ candidate, reason: "zero_stock" });
    } else {
      result.kept.push(candidate);
    }
  }

  return result;
}

/* -----------------------------
   Sub-scores
----------------------------- */

export function requiredQuantity(lineItem: ConsolidatedLineItem): number {
  return Math.max(1, lineItem.quantity);
}

/**
 * Unit price at the given order quantity: the largest break not above the
 * quantity, else the smallest break above it, else the reference unit price.
 */
export function resolvePrice(candidate: Candidate, quantity: number): number | null {
  if (candidate.priceBreaks.length === 0) return candidate.unitPrice;

  const breaks = [...candidate.priceBreaks].sort((a, b) => a.quantity - b.quantity);
  let applicable = breaks[0];
  for (const priceBreak of breaks) {
    if (priceBreak.quantity <= quantity) applicable = priceBreak;
  }
  return applicable.price;
}

export function scoreStock(stock: number, needed: number): number {
  if (stock <= 0) return 0;
  return Math.min(1, stock / Math.max(1, needed));
}

export function scorePrice(price: number | null, cheapest: number | null): number {
  if (price === null || cheapest === null) return 0;
  if (price <= 0) return 1;
  return Math.min(1, Math.max(0, cheapest / price));
}

export function scoreLifecycle(status: LifecycleStatus): number {
  return LIFECYCLE_SCORES[status];
}

function offeredPackages(candidate: Candidate): string[] {
  const offered = candidate.package ? [candidate.package] : [];
  for (const [name, value] of Object.entries(candidate.attributes)) {
    if (PACKAGE_ATTRIBUTE_NAME.test(name) && value) offered.push(value);
  }
  return offered;
}

export function scorePackage(requiredPackage: string | undefined, candidate: Candidate): number {
  if (!requiredPackage) return 1;

  let best = 0;
  for (const offered of offeredPackages(candidate)) {
    best = Math.max(best, PACKAGE_SCORES[matchPackage(requiredPackage, offered)]);
  }
  return best;
}

export function weightedScore(subScores: SubScores): number {
  return (
    SCORE_WEIGHTS.stock * subScores.stock +
    SCORE_WEIGHTS.price * subScores.price +
    SCORE_WEIGHTS.lifecycle * subScores.lifecycle +
    SCORE_WEIGHTS.package * subScores.package
  );
}

/* -----------------------------
   Ranking
----------------------------- */

/**
 * Orders candidates for one line item, best first. Ties keep the order the
 * catalog returned them in. Prices are scored against the cheapest candidate
 * that survives filtering, so the same part can score differently in a
 * different result set.
 *
 * Inputs are never mutated.
 */
export function rankCandidates(
  lineItem: ConsolidatedLineItem,
  candidates: readonly Candidate[],
  options: RankingOptions = {}
): ScoredCandidate[] {
  const { kept, excluded } = filterCandidates(candidates, options);
  if (kept.length === 0) {
    logger.debug("[rank] nothing to rank", { lineItemId: lineItem.id, excluded: excluded.length });
    return [];
  }

  const needed = requiredQuantity(lineItem);
  const prices = kept.map(c => resolvePrice(c, needed));
  const known = prices.filter((p): p is number => p !== null);
  const cheapest = known.length > 0 ? Math.min(...known) : null;

  const scored = kept.map((candidate, index) => {
    const effectivePrice = prices[index];
    const subScores: SubScores = {
      stock: scoreStock(candidate.stockQuantity, needed),
      price: scorePrice(effectivePrice, cheapest),
      lifecycle: scoreLifecycle(candidate.lifecycleStatus),
      package: scorePackage(lineItem.fields.package, candidate)
    };
    const score = weightedScore(subScores);

    logger.debug("[rank] candidate scored", {
      lineItemId: lineItem.id,
      partNumber: candidate.partNumber,
      stock: candidate.stockQuantity,
      price: effectivePrice,
      lifecycle: candidate.lifecycleStatus,
      package: candidate.package,
      subScores,
      score
    });

    const result: ScoredCandidate = {
      ...candidate,
      score,
      subScores,
      effectivePrice,
      requiredQuantity: needed
    };
    return { result, index };
  });

  scored.sort((a, b) => b.result.score - a.result.score || a.index - b.index);

  const ranked = scored.map(s => s.result);
  const limit = options.limit;
  return limit !== undefined && limit >= 0 ? ranked.slice(0, limit) : ranked;
}
