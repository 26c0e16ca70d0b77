// services/schemaNormalizer.ts
import { CANONICAL_FIELDS } from "../types.js";
import type { CanonicalField, ColumnMapping } from "../types.js";
import { SchemaError } from "./errors.js";
import { logger } from "../lib/logger.js";

// Header aliases per canonical field. Compared after lowercasing and removing whitespace.
const HEADER_ALIASES: Record<CanonicalField, string[]> = {
  refDes: ["refdes", "ref", "reference", "reference designator", "designator", "designators", "ref des"],
  mpn: [
    "mpn",
    "manufacturer part number",
    "part number",
    "part#",
    "mfr part number",
    "mfg part number",
    "mfr part #",
    "mfr pn"
  ],
  value: ["value", "component value", "val"],
  package: ["package", "footprint", "case", "case code", "size"],
  voltage: ["voltage", "voltage rating", "v rating", "v"],
  tolerance: ["tolerance", "tol"],
  power: ["power", "power rating", "wattage", "w"],
  description: ["description", "desc", "comment", "notes"],
  quantity: ["quantity", "qty", "qty per board"]
};

export function headerMatchKey(header: string): string {
  return header.toLowerCase().replace(/\s+/g, "");
}

const ALIAS_LOOKUP: Map<string, CanonicalField> = new Map(
  CANONICAL_FIELDS.flatMap(field =>
    HEADER_ALIASES[field].map(alias => [headerMatchKey(alias), field] as const)
  )
);

export function matchCanonicalField(header: string): CanonicalField | null {
  return ALIAS_LOOKUP.get(headerMatchKey(header)) ?? null;
}

/**
 * Maps each column of a header row to a canonical field or to Other(name).
 *
 * The first column claiming a canonical field keeps it; later columns for the
 * same field are demoted to Other and flagged with `duplicateOf`. Other names
 * are made unique with a numeric suffix so no column shares a slot.
 */
export function normalizeHeaders(headers: readonly unknown[]): ColumnMapping[] {
  if (!headers || headers.length === 0) {
    throw new SchemaError("Header row is empty");
  }

  const trimmed = headers.map(h => (h === null || h === undefined ? "" : String(h).trim()));

  if (!trimmed.some(h => h.length > 0)) {
    throw new SchemaError("Header row has no usable columns");
  }

  const claimed = new Set<CanonicalField>();
  const usedOtherNames = new Set<string>();

  const uniqueOtherName = (base: string): string => {
    let name = base;
    let n = 1;
    while (usedOtherNames.has(name)) {
      n++;
      name = `${base}_${n}`;
    }
    usedOtherNames.add(name);
    return name;
  };

  const columns = trimmed.map((header, index): ColumnMapping => {
    if (!header) {
      return { index, header, key: { kind: "other", name: uniqueOtherName(`col_${index}`) } };
    }

    const field = matchCanonicalField(header);

    if (field && !claimed.has(field)) {
      claimed.add(field);
      return { index, header, key: { kind: "canonical", field } };
    }

    const mapping: ColumnMapping = {
      index,
      header,
      key: { kind: "other", name: uniqueOtherName(header) }
    };
    if (field) {
      mapping.duplicateOf = field;
    }
    return mapping;
  });

  const duplicates = columns.filter(c => c.duplicateOf);
  if (duplicates.length > 0) {
    logger.warn("[schema] duplicate columns demoted to Other", {
      columns: duplicates.map(c => ({ header: c.header, duplicateOf: c.duplicateOf }))
    });
  }

  logger.debug("[schema] header mapping", {
    columns: columns.map(c => ({
      header: c.header,
      key: c.key.kind === "canonical" ? c.key.field : `other:${c.key.name}`
    }))
  });

  return columns;
}
