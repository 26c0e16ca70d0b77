// services/normalizeCandidate.ts
import type { Candidate, LifecycleStatus, PriceBreak, SkippedCandidate } from "../types.js";
import { CandidateParseError } from "./errors.js";
import { logger } from "../lib/logger.js";
import { isRecord, type UnknownRecord } from "../lib/guards.js";

/**
 * Raw catalog records arrive in the distributor's own shape (Mouser's
 * PascalCase search results) or in a generic camelCase shape. Each canonical
 * field lists the source keys it may come from, in priority order.
 */
const FIELD_SOURCES = {
  partNumber: ["ManufacturerPartNumber", "MfrPartNumber", "partNumber", "mpn"],
  manufacturer: ["Manufacturer", "Mfr", "manufacturer"],
  distributorPartNumber: ["MouserPartNumber", "distributorPartNumber", "PartNumber"],
  candidateId: ["candidateId", "id"],
  description: ["Description", "ProductDescription", "description"],
  package: ["Package", "CaseCode", "package", "footprint"],
  stock: ["AvailabilityInStock", "stockQuantity", "stock"],
  availability: ["Availability", "availability"],
  lifecycle: ["LifecycleStatus", "lifecycleStatus", "lifecycle", "Status"],
  unitPrice: ["UnitPrice", "unitPrice", "price"],
  priceBreaks: ["PriceBreaks", "priceBreaks"],
  attributes: ["ProductAttributes", "attributes"],
  productUrl: ["ProductDetailUrl", "ProductUrl", "productUrl"],
  datasheetUrl: ["DataSheetUrl", "DataSheet", "datasheetUrl"],
  leadTime: ["LeadTime", "leadTime"],
  currency: ["Currency", "currency"]
} as const;

// Attribute names that carry the package or footprint when the record has no direct field.
const PACKAGE_ATTRIBUTE_PATTERN = /^(package(\s*\/\s*case)?|case(\s*code)?(\s*-\s*(in|mm))?|footprint)$/i;

const LIFECYCLE_ALIASES: Record<string, LifecycleStatus> = {
  "active": "Active",
  "new product": "Active",
  "new at mouser": "Active",
  "new": "Active",
  "production": "Active",
  "nrnd": "NRND",
  "not recommended for new designs": "NRND",
  "last time buy": "NRND",
  "lifebuy": "NRND",
  "life buy": "NRND",
  "end of life notice": "NRND",
  "obsolete": "Obsolete",
  "eol": "Obsolete",
  "end of life": "Obsolete",
  "end of life (eol)": "Obsolete",
  "discontinued": "Obsolete"
};

type RawRecord = UnknownRecord;

function pick(raw: RawRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

function pickString(raw: RawRecord, keys: readonly string[]): string | null {
  const value = pick(raw, keys);
  if (typeof value === "string") return value.trim() || null;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/* -----------------------------
   Value parsers
----------------------------- */

/**
 * Rewrites a price with "." or "," separators to plain decimal notation.
 * With both present the last one is the decimal mark ("1.234,56", "1,234.56").
 * A lone comma is a decimal mark unless it groups thousands ("1,234"); a
 * leading zero always makes it decimal ("0,125").
 */
function toDecimalNotation(cleaned: string): string {
  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");

  if (lastComma !== -1 && lastDot !== -1) {
    return lastComma > lastDot
      ? cleaned.replace(/\./g, "").replace(",", ".")
      : cleaned.replace(/,/g, "");
  }
  if (lastComma !== -1) {
    if (/^-?0,\d+$/.test(cleaned) || /^-?\d+,(?:\d{1,2}|\d{4,})$/.test(cleaned)) {
      return cleaned.replace(",", ".");
    }
    return cleaned.replace(/,/g, "");
  }
  if (cleaned.indexOf(".") !== lastDot) {
    // "1.234.567"
    return cleaned.replace(/\./g, "");
  }
  return cleaned;
}

export function parsePrice(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== "string") return null;

  const parsed = Number.parseFloat(toDecimalNotation(value.replace(/[^\d.,-]/g, "")));
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

export function parseStock(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : null;
  }
  if (typeof value !== "string") return null;

  // "1,234 In Stock", "1234"
  const match = value.trim().match(/^(\d[\d,]*)/);
  if (!match) return null;
  const parsed = Number.parseInt(match[1].replace(/,/g, ""), 10);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseLifecycle(value: unknown): LifecycleStatus {
  if (typeof value !== "string") return "Unknown";
  const normalized = value.trim().toLowerCase().replace(/\s+/g, " ");
  if (!normalized) return "Unknown";
  return LIFECYCLE_ALIASES[normalized] ?? "Unknown";
}

function parseQuantity(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) && value > 0 ? Math.floor(value) : null;
  if (typeof value !== "string") return null;
  const parsed = Number.parseInt(value.replace(/[,\s]/g, ""), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function parsePriceBreaks(value: unknown): { breaks: PriceBreak[]; currency: string | null } {
  if (!Array.isArray(value)) return { breaks: [], currency: null };

  const byQuantity = new Map<number, number>();
  let currency: string | null = null;

  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const quantity = parseQuantity(pick(entry, ["Quantity", "quantity", "qty"]));
    const price = parsePrice(pick(entry, ["Price", "price", "unitPrice"]));
    if (quantity === null || price === null) continue;
    if (!byQuantity.has(quantity)) byQuantity.set(quantity, price);

    if (!currency) {
      const c = pick(entry, ["Currency", "currency"]);
      if (typeof c === "string" && c.trim()) currency = c.trim();
    }
  }

  const breaks = Array.from(byQuantity, ([quantity, price]) => ({ quantity, price })).sort(
    (a, b) => a.quantity - b.quantity
  );
  return { breaks, currency };
}

function parseAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};

  if (Array.isArray(value)) {
    // Mouser: [{ AttributeName, AttributeValue }]
    for (const entry of value) {
      if (!isRecord(entry)) continue;
      const name = pick(entry, ["AttributeName", "name"]);
      const attrValue = pick(entry, ["AttributeValue", "value"]);
      if (typeof name !== "string" || !name.trim()) continue;
      if (typeof attrValue !== "string" && typeof attrValue !== "number") continue;
      const key = name.trim();
      const text = String(attrValue).trim();
      attributes[key] = key in attributes ? `${attributes[key]}; ${text}` : text;
    }
  } else if (isRecord(value)) {
    for (const [key, attrValue] of Object.entries(value)) {
      if (typeof attrValue === "string" || typeof attrValue === "number") {
        attributes[key] = String(attrValue).trim();
      }
    }
  }

  return attributes;
}

function packageFromAttributes(attributes: Record<string, string>): string | null {
  for (const [name, value] of Object.entries(attributes)) {
    if (PACKAGE_ATTRIBUTE_PATTERN.test(name.trim()) && value) return value;
  }
  return null;
}

function stockFrom(raw: RawRecord): number {
  const direct = parseStock(pick(raw, FIELD_SOURCES.stock));
  if (direct !== null && direct > 0) return direct;

  const availability = pick(raw, FIELD_SOURCES.availability);
  if (isRecord(availability)) {
    const onHand = parseStock(pick(availability, ["OnHand", "Quantity", "onHand"]));
    if (onHand !== null) return onHand;
  } else {
    const parsed = parseStock(availability);
    if (parsed !== null) return parsed;
  }

  return direct ?? 0;
}

function referencePrice(breaks: PriceBreak[], explicit: number | null): number | null {
  if (explicit !== null) return explicit;
  if (breaks.length === 0) return null;
  return (breaks.find(b => b.quantity === 1) ?? breaks[0]).price;
}

/* -----------------------------
   Public API
----------------------------- */

/**
 * Maps one raw catalog record onto the canonical Candidate shape.
 * Missing stock, lifecycle and price breaks fall back to conservative
 * defaults; a record without a part number throws CandidateParseError.
 */
export function normalizeCandidate(raw: unknown, index: number): Candidate {
  if (!isRecord(raw)) {
    throw new CandidateParseError(`Candidate record ${index} is not an object`, index);
  }

  const partNumber = pickString(raw, FIELD_SOURCES.partNumber);
  if (!partNumber) {
    throw new CandidateParseError(`Candidate record ${index} has no part number`, index);
  }

  const distributorPartNumber = pickString(raw, FIELD_SOURCES.distributorPartNumber);
  const attributes = parseAttributes(pick(raw, FIELD_SOURCES.attributes));
  const { breaks, currency: breakCurrency } = parsePriceBreaks(pick(raw, FIELD_SOURCES.priceBreaks));
  const unitPrice = referencePrice(breaks, parsePrice(pick(raw, FIELD_SOURCES.unitPrice)));
  const priceBreaks = breaks.length > 0 || unitPrice === null ? breaks : [{ quantity: 1, price: unitPrice }];

  return {
    candidateId:
      distributorPartNumber ?? pickString(raw, FIELD_SOURCES.candidateId) ?? `${partNumber}#${index}`,
    partNumber,
    manufacturer: pickString(raw, FIELD_SOURCES.manufacturer) ?? "",
    description: pickString(raw, FIELD_SOURCES.description) ?? "",
    package: pickString(raw, FIELD_SOURCES.package) ?? packageFromAttributes(attributes),
    unitPrice,
    priceBreaks,
    stockQuantity: stockFrom(raw),
    lifecycleStatus: parseLifecycle(pick(raw, FIELD_SOURCES.lifecycle)),
    attributes,
    distributorPartNumber,
    productUrl: pickString(raw, FIELD_SOURCES.productUrl),
    datasheetUrl: pickString(raw, FIELD_SOURCES.datasheetUrl),
    currency: breakCurrency ?? pickString(raw, FIELD_SOURCES.currency),
    leadTime: pickString(raw, FIELD_SOURCES.leadTime)
  };
}

export function normalizeCandidates(raws: readonly unknown[]): {
  candidates: Candidate[];
  skipped: SkippedCandidate[];
} {
  const candidates: Candidate[] = [];
  const skipped: SkippedCandidate[] = [];

  raws.forEach((raw, index) => {
    try {
      candidates.push(normalizeCandidate(raw, index));
    } catch (err) {
      if (!(err instanceof CandidateParseError)) throw err;
      skipped.push({ index: err.recordIndex, reason: err.message });
    }
  });

  if (skipped.length > 0) {
    logger.warn("[candidates] skipped unusable catalog records", { skipped: skipped.length, total: raws.length });
  }

  return { candidates, skipped };
}
