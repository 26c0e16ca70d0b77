// services/consolidateLineItems.ts
import { CANONICAL_FIELDS } from "../types.js";
import type {
  CellValue,
  ColumnMapping,
  ConsolidatedLineItem,
  ConsolidationResult,
  LineItemFields,
  MergeConflict,
  RawRow,
  RowIssue
} from "../types.js";
import { sortRefDes, splitRefDes } from "./refDes.js";
import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/guards.js";

type FieldName = keyof LineItemFields;

export const ITEM_FIELDS: readonly FieldName[] = CANONICAL_FIELDS.filter(
  (field): field is FieldName => field !== "refDes"
);

interface ExtractedRow {
  fields: LineItemFields;
  otherFields: Record<string, string>;
  refDes: string[];
}

interface Draft {
  item: ConsolidatedLineItem;
  refDes: string[];
}

/* -----------------------------
   Cell & row extraction
----------------------------- */

type CellReading = { ok: true; value: string | undefined } | { ok: false };

function readCell(value: unknown): CellReading {
  if (value === null || value === undefined) return { ok: true, value: undefined };

  if (typeof value === "string") {
    const trimmed = value.trim();
    return { ok: true, value: trimmed || undefined };
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? { ok: true, value: String(value) } : { ok: false };
  }
  if (typeof value === "boolean") {
    return { ok: true, value: String(value) };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? { ok: false }
      : { ok: true, value: value.toISOString().slice(0, 10) };
  }
  return { ok: false };
}

function isPositionalRow(row: RawRow): row is readonly CellValue[] {
  return Array.isArray(row);
}

function hasOwn(row: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, key);
}

// Header mappings hold trimmed text; keyed rows may carry the padded original.
function recordKeyFor(row: Readonly<Record<string, CellValue>>, column: ColumnMapping): string | undefined {
  if (hasOwn(row, column.header)) return column.header;
  return Object.keys(row).find(key => key.trim() === column.header);
}

function cellAt(row: RawRow, column: ColumnMapping): unknown {
  if (isPositionalRow(row)) return row[column.index];
  const key = recordKeyFor(row, column);
  return key === undefined ? undefined : row[key];
}

function extractRow(
  row: RawRow,
  columns: readonly ColumnMapping[],
  rowIndex: number,
  issues: RowIssue[]
): ExtractedRow {
  const extracted: ExtractedRow = { fields: {}, otherFields: {}, refDes: [] };

  if (!isPositionalRow(row)) {
    const record = row;
    const keys = Object.keys(record);
    if (keys.length > 0 && !columns.some(column => recordKeyFor(record, column) !== undefined)) {
      issues.push({ rowIndex, reason: `Row keys match no column: ${keys.join(", ")}` });
    }
  }

  for (const column of columns) {
    const reading = readCell(cellAt(row, column));

    if (!reading.ok) {
      const label = column.key.kind === "canonical" ? column.key.field : column.key.name;
      issues.push({ rowIndex, reason: `Unreadable cell in column "${column.header || label}"` });
      continue;
    }
    if (reading.value === undefined) continue;

    const key = column.key;
    if (key.kind === "other") {
      extracted.otherFields[key.name] = reading.value;
    } else if (key.field === "refDes") {
      extracted.refDes.push(...splitRefDes(reading.value));
    } else {
      const field = key.field;
      extracted.fields[field] = field === "mpn" ? reading.value.toUpperCase() : reading.value;
    }
  }

  return extracted;
}

/* -----------------------------
   Merge keys
----------------------------- */

function foldKey(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase();
}

function mpnKeyOf(fields: LineItemFields): string | null {
  const mpn = fields.mpn?.trim().toUpperCase();
  return mpn ? mpn : null;
}

function valuePackageKeyOf(fields: LineItemFields): string | null {
  if (!fields.value && !fields.package) return null;
  return `${foldKey(fields.value)}|${foldKey(fields.package)}`;
}

function descriptionKeyOf(fields: LineItemFields): string | null {
  const desc = foldKey(fields.description);
  return desc ? desc : null;
}

function compareValue(field: string, value: string): string {
  return field === "mpn" ? value.trim().toUpperCase() : value.trim().toLowerCase();
}

export function parseExplicitQuantity(raw: string | undefined): number | null {
  if (!raw) return null;
  const match = /^(\d+)(?:\.0+)?$/.exec(raw.trim());
  return match ? Number.parseInt(match[1], 10) : null;
}

/* -----------------------------
   Draft handling
----------------------------- */

function mergeInto(draft: Draft, row: ExtractedRow, rowIndex: number) {
  const { item } = draft;

  const record = (field: string, kept: string, discarded: string) => {
    const conflict: MergeConflict = { lineItemId: item.id, field, kept, discarded, rowIndex };
    item.conflicts.push(conflict);
    logger.debug("[consolidate] conflicting value kept first", { ...conflict });
  };

  for (const field of ITEM_FIELDS) {
    const value = row.fields[field];
    if (value === undefined) continue;
    const existing = item.fields[field];
    if (existing === undefined) {
      item.fields[field] = value;
    } else if (compareValue(field, existing) !== compareValue(field, value)) {
      record(field, existing, value);
    }
  }

  for (const [name, value] of Object.entries(row.otherFields)) {
    const existing = item.otherFields[name];
    if (existing === undefined) {
      item.otherFields[name] = value;
    } else if (compareValue(name, existing) !== compareValue(name, value)) {
      record(name, existing, value);
    }
  }

  draft.refDes.push(...row.refDes);
  item.sourceRows.push(rowIndex);
}

function finalize(draft: Draft): ConsolidatedLineItem {
  const { item } = draft;
  const refDesList = sortRefDes(draft.refDes);
  const count = refDesList.length;
  const explicit = parseExplicitQuantity(item.fields.quantity);

  let quantity: number;
  if (explicit !== null && explicit > count) {
    quantity = explicit;
  } else if (count > 0 || explicit !== null) {
    quantity = count;
  } else {
    quantity = item.sourceRows.length;
  }

  const mpn = mpnKeyOf(item.fields);
  const vp = valuePackageKeyOf(item.fields);
  const desc = descriptionKeyOf(item.fields);

  const mergeKey = mpn
    ? `mpn:${mpn}`
    : vp
      ? `vp:${vp}`
      : desc
        ? `desc:${desc}`
        : `row:${item.sourceRows[0]}`;

  return { ...item, mergeKey, refDesList, quantity };
}

function isRowShape(row: unknown): row is RawRow {
  return typeof row === "object" && row !== null;
}

/* -----------------------------
   Public API
----------------------------- */

/**
 * Merges BOM body rows into consolidated line items, in first-seen order.
 *
 * Rows with the same MPN always merge. A row without an MPN merges with the
 * first item seen with the same (Value, Package) pair; a row with a new MPN
 * may adopt an MPN-less item with the same pair. Conflicting values keep the
 * first non-empty one and are recorded on the item.
 *
 * Bad rows are reported in `issues` and never abort the run.
 */
export function consolidateLineItems(
  rows: readonly unknown[],
  columns: readonly ColumnMapping[]
): ConsolidationResult {
  const issues: RowIssue[] = [];
  const drafts: Draft[] = [];

  const byMpn = new Map<string, Draft>();
  const byValuePackage = new Map<string, Draft>();
  const byDescription = new Map<string, Draft>();

  rows.forEach((row, rowIndex) => {
    if (!isRowShape(row)) {
      issues.push({ rowIndex, reason: "Row is not a record or array; skipped" });
      return;
    }

    let extracted: ExtractedRow;
    try {
      extracted = extractRow(row, columns, rowIndex, issues);
    } catch (err) {
      // Accessors on exotic row objects can throw; keep the rest of the file moving.
      issues.push({
        rowIndex,
        reason: `Row could not be read: ${errorMessage(err)}`
      });
      return;
    }

    const isEmpty =
      Object.keys(extracted.fields).length === 0 &&
      Object.keys(extracted.otherFields).length === 0 &&
      extracted.refDes.length === 0;
    if (isEmpty) return;

    const mpn = mpnKeyOf(extracted.fields);
    const vp = valuePackageKeyOf(extracted.fields);
    const desc = mpn || vp ? null : descriptionKeyOf(extracted.fields);

    let target: Draft | undefined;
    if (mpn) {
      target = byMpn.get(mpn);
      if (!target && vp) {
        const sameValuePackage = byValuePackage.get(vp);
        if (sameValuePackage && !mpnKeyOf(sameValuePackage.item.fields)) {
          target = sameValuePackage;
        }
      }
    } else if (vp) {
      target = byValuePackage.get(vp);
    } else if (desc) {
      target = byDescription.get(desc);
    }

    if (!target) {
      target = {
        item: {
          id: drafts.length + 1,
          mergeKey: "",
          fields: {},
          otherFields: {},
          refDesList: [],
          quantity: 0,
          sourceRows: [],
          conflicts: [],
          selectedCandidateId: null
        },
        refDes: []
      };
      drafts.push(target);
    }

    mergeInto(target, extracted, rowIndex);

    if (mpn && !byMpn.has(mpn)) byMpn.set(mpn, target);
    if (vp && !byValuePackage.has(vp)) byValuePackage.set(vp, target);
    if (desc && !byDescription.has(desc)) byDescription.set(desc, target);
  });

  const lineItems = drafts.map(finalize);

  logger.info("[consolidate] BOM rows consolidated", {
    rows: rows.length,
    lineItems: lineItems.length,
    issues: issues.length,
    conflicts: lineItems.reduce((sum, item) => sum + item.conflicts.length, 0)
  });

  return { lineItems, issues };
}
