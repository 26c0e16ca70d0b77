// api/bom.ts
import { Router, type Request, type Response } from "express";
import type { ConsolidatedLineItem, LineItemFields } from "../types.js";
import { normalizeHeaders } from "../services/schemaNormalizer.js";
import { consolidateLineItems, ITEM_FIELDS } from "../services/consolidateLineItems.js";
import { normalizeCandidates } from "../services/normalizeCandidate.js";
import { rankCandidates, type RankingOptions } from "../services/rankCandidates.js";
import { SchemaError } from "../services/errors.js";
import { logger } from "../lib/logger.js";
import { errorMessage, isRecord } from "../lib/guards.js";

export const bomRouter = Router();

/* -----------------------------
   Payload parsing
----------------------------- */

// Accepts a consolidated line item or any object carrying `fields`.
export function parseLineItem(value: unknown): ConsolidatedLineItem | null {
  if (!isRecord(value) || !isRecord(value.fields)) return null;

  const rawFields = value.fields;
  const fields: LineItemFields = {};
  for (const field of ITEM_FIELDS) {
    const v = rawFields[field];
    if (typeof v === "string" && v.trim()) fields[field] = v.trim();
    else if (typeof v === "number" && Number.isFinite(v)) fields[field] = String(v);
  }

  const refDesList = Array.isArray(value.refDesList)
    ? value.refDesList.filter((r): r is string => typeof r === "string")
    : [];
  const quantity =
    typeof value.quantity === "number" && Number.isFinite(value.quantity) && value.quantity >= 0
      ? value.quantity
      : refDesList.length;

  return {
    id: typeof value.id === "number" ? value.id : 0,
    mergeKey: typeof value.mergeKey === "string" ? value.mergeKey : "",
    fields,
    otherFields: {},
    refDesList,
    quantity,
    sourceRows: [],
    conflicts: [],
    selectedCandidateId: null
  };
}

export function parseRankingOptions(value: unknown): RankingOptions | null {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) return null;

  const options: RankingOptions = {};
  if (typeof value.allowObsolete === "boolean") options.allowObsolete = value.allowObsolete;
  if (typeof value.excludeZeroStock === "boolean") options.excludeZeroStock = value.excludeZeroStock;
  if (typeof value.limit === "number" && Number.isInteger(value.limit) && value.limit >= 0) {
    options.limit = value.limit;
  }
  return options;
}

/* -----------------------------
   Handlers
----------------------------- */

export function consolidateHandler(req: Request, res: Response) {
  const body: unknown = req.body;
  if (!isRecord(body) || !Array.isArray(body.headers) || !Array.isArray(body.rows)) {
    return res.status(400).json({
      error: "Expected { headers: unknown[], rows: unknown[] }"
    });
  }

  try {
    const columns = normalizeHeaders(body.headers);
    const { lineItems, issues } = consolidateLineItems(body.rows, columns);
    return res.json({ columns, lineItems, issues });
  } catch (err) {
    if (err instanceof SchemaError) {
      return res.status(400).json({ error: err.message });
    }
    logger.error("[api] consolidate failed", err);
    return res.status(500).json({ error: errorMessage(err) || "Internal error" });
  }
}

export function rankHandler(req: Request, res: Response) {
  const body: unknown = req.body;
  const lineItem = isRecord(body) ? parseLineItem(body.lineItem) : null;
  const options = isRecord(body) ? parseRankingOptions(body.options) : null;

  if (!isRecord(body) || !lineItem || !options || !Array.isArray(body.candidates)) {
    return res.status(400).json({
      error: "Expected { lineItem: { fields, quantity? }, candidates: unknown[], options? }"
    });
  }

  try {
    const { candidates, skipped } = normalizeCandidates(body.candidates);
    const ranked = rankCandidates(lineItem, candidates, options);
    return res.json({ ranked, skipped });
  } catch (err) {
    logger.error("[api] rank failed", err);
    return res.status(500).json({ error: errorMessage(err) || "Internal error" });
  }
}

bomRouter.post("/consolidate", consolidateHandler);
bomRouter.post("/rank", rankHandler);
