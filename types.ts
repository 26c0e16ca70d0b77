/* -----------------------------
   BOM input
----------------------------- */

export type CellValue = string | number | boolean | Date | null | undefined;

/**
 * One body row of a BOM table. Readers either key cells by header text or
 * hand over the row positionally, aligned with the header row.
 */
export type RawRow = Readonly<Record<string, CellValue>> | readonly CellValue[];

export const CANONICAL_FIELDS = [
  "refDes",
  "mpn",
  "value",
  "package",
  "voltage",
  "tolerance",
  "power",
  "description",
  "quantity"
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type FieldKey =
  | { kind: "canonical"; field: CanonicalField }
  | { kind: "other"; name: string };

export interface ColumnMapping {
  index: number;
  header: string;
  key: FieldKey;
  // Set when this column repeats a canonical field claimed by an earlier column.
  duplicateOf?: CanonicalField;
}

/* -----------------------------
   Consolidated BOM
----------------------------- */

export type LineItemFields = Partial<Record<Exclude<CanonicalField, "refDes">, string>>;

export interface MergeConflict {
  lineItemId: number;
  field: string;
  kept: string;
  discarded: string;
  rowIndex: number;
}

export interface RowIssue {
  rowIndex: number;
  reason: string;
}

export interface ConsolidatedLineItem {
  id: number;
  mergeKey: string;
  fields: LineItemFields;
  otherFields: Record<string, string>;
  refDesList: string[];
  quantity: number;
  sourceRows: number[];
  conflicts: MergeConflict[];
  selectedCandidateId: string | null;
}

export interface ConsolidationResult {
  lineItems: ConsolidatedLineItem[];
  issues: RowIssue[];
}

/* -----------------------------
   Catalog candidates
----------------------------- */

export type LifecycleStatus = "Active" | "NRND" | "Obsolete" | "Unknown";

export interface PriceBreak {
  quantity: number;
  price: number;
}

export interface Candidate {
  candidateId: string;
  partNumber: string;
  manufacturer: string;
  description: string;
  package: string | null;
  unitPrice: number | null;
  priceBreaks: PriceBreak[];
  stockQuantity: number;
  lifecycleStatus: LifecycleStatus;
  attributes: Record<string, string>;

  distributorPartNumber: string | null;
  productUrl: string | null;
  datasheetUrl: string | null;
  currency: string | null;
  leadTime: string | null;
}

export interface SubScores {
  stock: number;
  price: number;
  lifecycle: number;
  package: number;
}

export interface ScoredCandidate extends Candidate {
  score: number;
  subScores: SubScores;
  effectivePrice: number | null;
  requiredQuantity: number;
}

export interface SkippedCandidate {
  index: number;
  reason: string;
}

/* -----------------------------
   Tables & export
----------------------------- */

// First sheet of a BOM file: the header row and the body rows below it.
export interface BomTable {
  headers: CellValue[];
  rows: CellValue[][];
}

export const EXPORT_COLUMNS = [
  "REFDES",
  "Quantity",
  "Description",
  "Package",
  "MPN",
  "Distributor Part Number",
  "Manufacturer",
  "Value",
  "Voltage",
  "Stock",
  "Price",
  "Lifecycle",
  "Product URL"
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number>;
