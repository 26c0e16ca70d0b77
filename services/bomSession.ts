// services/bomSession.ts
import type {
  ColumnMapping,
  ConsolidatedLineItem,
  ExportRow,
  RowIssue,
  ScoredCandidate,
  SkippedCandidate
} from "../types.js";
import { normalizeHeaders } from "./schemaNormalizer.js";
import { consolidateLineItems } from "./consolidateLineItems.js";
import { normalizeCandidates } from "./normalizeCandidate.js";
import { rankCandidates, type RankingOptions } from "./rankCandidates.js";
import { SessionError } from "./errors.js";
import { logger } from "../lib/logger.js";

export const SNAPSHOT_VERSION = "1.0";

interface CandidateState {
  ranked: ScoredCandidate[];
  skipped: SkippedCandidate[];
}

export interface BomSessionSnapshot {
  version: typeof SNAPSHOT_VERSION;
  columns: ColumnMapping[];
  lineItems: ConsolidatedLineItem[];
  issues: RowIssue[];
  candidates: Record<string, CandidateState>;
}

function copyItem(item: ConsolidatedLineItem): ConsolidatedLineItem {
  return {
    ...item,
    fields: { ...item.fields },
    otherFields: { ...item.otherFields },
    refDesList: [...item.refDesList],
    sourceRows: [...item.sourceRows],
    conflicts: item.conflicts.map(c => ({ ...c }))
  };
}

/**
 * Working state for one BOM: consolidated line items, the ranked candidates
 * fetched for each of them and the candidate the user picked.
 */
export class BomSession {
  private readonly items: ConsolidatedLineItem[];
  private readonly candidates = new Map<number, CandidateState>();

  private constructor(
    readonly columns: ColumnMapping[],
    items: ConsolidatedLineItem[],
    readonly issues: RowIssue[]
  ) {
    this.items = items;
  }

  static fromTable(headers: readonly unknown[], rows: readonly unknown[]): BomSession {
    const columns = normalizeHeaders(headers);
    const { lineItems, issues } = consolidateLineItems(rows, columns);
    return new BomSession(columns, lineItems, issues);
  }

  static fromSnapshot(snapshot: BomSessionSnapshot): BomSession {
    if (snapshot.version !== SNAPSHOT_VERSION) {
      throw new SessionError(`Unsupported snapshot version: ${String(snapshot.version)}`);
    }

    const session = new BomSession(
      snapshot.columns.map(c => ({ ...c })),
      snapshot.lineItems.map(copyItem),
      snapshot.issues.map(i => ({ ...i }))
    );

    for (const [key, state] of Object.entries(snapshot.candidates)) {
      const id = Number(key);
      session.requireItem(id);
      session.candidates.set(id, { ranked: [...state.ranked], skipped: [...state.skipped] });
    }
    return session;
  }

  lineItems(): ConsolidatedLineItem[] {
    return this.items.map(copyItem);
  }

  getLineItem(id: number): ConsolidatedLineItem | null {
    const item = this.items.find(i => i.id === id);
    return item ? copyItem(item) : null;
  }

  private requireItem(id: number): ConsolidatedLineItem {
    const item = this.items.find(i => i.id === id);
    if (!item) throw new SessionError(`Unknown line item: ${id}`);
    return item;
  }

  /**
   * Normalizes and ranks raw catalog records for a line item, replacing any
   * earlier result. A selection that is no longer in the list is cleared.
   */
  setCandidates(id: number, rawRecords: readonly unknown[], options: RankingOptions = {}): ScoredCandidate[] {
    const item = this.requireItem(id);
    const { candidates, skipped } = normalizeCandidates(rawRecords);
    const ranked = rankCandidates(item, candidates, options);

    this.candidates.set(id, { ranked, skipped });

    if (item.selectedCandidateId && !ranked.some(c => c.candidateId === item.selectedCandidateId)) {
      logger.info("[session] selection cleared after re-ranking", {
        lineItemId: id,
        candidateId: item.selectedCandidateId
      });
      item.selectedCandidateId = null;
    }

    return [...ranked];
  }

  rankedCandidates(id: number): ScoredCandidate[] {
    this.requireItem(id);
    return [...(this.candidates.get(id)?.ranked ?? [])];
  }

  skippedCandidates(id: number): SkippedCandidate[] {
    this.requireItem(id);
    return [...(this.candidates.get(id)?.skipped ?? [])];
  }

  selectCandidate(id: number, candidateId: string | null): void {
    const item = this.requireItem(id);

    if (candidateId !== null) {
      const ranked = this.candidates.get(id)?.ranked ?? [];
      if (!ranked.some(c => c.candidateId === candidateId)) {
        throw new SessionError(`Candidate ${candidateId} is not ranked for line item ${id}`);
      }
    }

    item.selectedCandidateId = candidateId;
  }

  selectedCandidate(id: number): ScoredCandidate | null {
    const item = this.requireItem(id);
    if (!item.selectedCandidateId) return null;
    const ranked = this.candidates.get(id)?.ranked ?? [];
    return ranked.find(c => c.candidateId === item.selectedCandidateId) ?? null;
  }

  // One row per line item that has a selected candidate, in line-item order.
  exportRows(): ExportRow[] {
    const rows: ExportRow[] = [];

    for (const item of this.items) {
      const candidate = this.selectedCandidate(item.id);
      if (!candidate) continue;

      rows.push({
        "REFDES": item.refDesList.join(", "),
        "Quantity": item.quantity,
        "Description": candidate.description || item.fields.description || "",
        "Package": candidate.package ?? item.fields.package ?? "",
        "MPN": candidate.partNumber,
        "Distributor Part Number": candidate.distributorPartNumber ?? "",
        "Manufacturer": candidate.manufacturer,
        "Value": item.fields.value ?? "",
        "Voltage": item.fields.voltage ?? "",
        "Stock": candidate.stockQuantity,
        "Price": candidate.effectivePrice ?? "",
        "Lifecycle": candidate.lifecycleStatus,
        "Product URL": candidate.productUrl ?? ""
      });
    }

    return rows;
  }

  toSnapshot(): BomSessionSnapshot {
    const candidates: Record<string, CandidateState> = {};
    for (const [id, state] of this.candidates) {
      candidates[String(id)] = { ranked: [...state.ranked], skipped: [...state.skipped] };
    }

    return {
      version: SNAPSHOT_VERSION,
      columns: this.columns.map(c => ({ ...c })),
      lineItems: this.lineItems(),
      issues: this.issues.map(i => ({ ...i })),
      candidates
    };
  }
}
