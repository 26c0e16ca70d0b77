import { describe, expect, it } from "vitest";
import { BomSession, type BomSessionSnapshot } from "../services/bomSession.js";
import { SessionError } from "../services/errors.js";
import { mouserPart } from "./fixtures.js";

const headers = ["RefDes", "MPN", "Value", "Package", "Description"];
const rows = [
  ["R1", "RC0603FR-071KL", "1k", "0603", "Resistor"],
  ["R2", "RC0603FR-071KL", "1k", "0603"],
  ["C1", null, "100nF", "0402", "Capacitor"]
];

function sessionWithCandidates(): BomSession {
  const session = BomSession.fromTable(headers, rows);
  session.setCandidates(1, [
    mouserPart(),
    mouserPart({
      MouserPartNumber: "603-ALT",
      ManufacturerPartNumber: "RC0603FR-07ALT",
      AvailabilityInStock: "0"
    }),
    { foo: 1 }
  ]);
  return session;
}

describe("BomSession", () => {
  it("consolidates the table it was built from", () => {
    const session = BomSession.fromTable(headers, rows);

    expect(session.lineItems().map(i => [i.id, i.refDesList, i.quantity])).toEqual([
      [1, ["R1", "R2"], 2],
      [2, ["C1"], 1]
    ]);
    expect(session.issues).toEqual([]);
    expect(session.getLineItem(3)).toBeNull();
  });

  it("hands out copies of its line items", () => {
    const session = BomSession.fromTable(headers, rows);
    const item = session.getLineItem(1);
    if (item) item.fields.value = "changed";

    expect(session.getLineItem(1)?.fields.value).toBe("1k");
  });

  it("stores ranked candidates and skipped records per line item", () => {
    const session = sessionWithCandidates();

    expect(session.rankedCandidates(1).map(c => [c.candidateId, c.score])).toEqual([
      ["603-RC0603FR-071KL", 0.9],
      ["603-ALT", 0.6]
    ]);
    expect(session.skippedCandidates(1)).toEqual([
      { index: 2, reason: "Candidate record 2 has no part number" }
    ]);
    expect(session.rankedCandidates(2)).toEqual([]);
  });

  it("only selects ranked candidates of known line items", () => {
    const session = sessionWithCandidates();

    expect(() => session.selectCandidate(1, "missing")).toThrow(SessionError);
    expect(() => session.selectCandidate(99, null)).toThrow(SessionError);
    expect(() => session.setCandidates(99, [])).toThrow(SessionError);

    session.selectCandidate(1, "603-ALT");
    expect(session.getLineItem(1)?.selectedCandidateId).toBe("603-ALT");

    session.selectCandidate(1, null);
    expect(session.getLineItem(1)?.selectedCandidateId).toBeNull();
  });

  it("clears a selection that disappears after re-ranking", () => {
    const session = sessionWithCandidates();
    session.selectCandidate(1, "603-ALT");

    session.setCandidates(1, [mouserPart()]);

    expect(session.getLineItem(1)?.selectedCandidateId).toBeNull();
  });

  it("exports one row per selected line item", () => {
    const session = sessionWithCandidates();
    session.selectCandidate(1, "603-RC0603FR-071KL");

    expect(session.exportRows()).toEqual([
      {
        "REFDES": "R1, R2",
        "Quantity": 2,
        "Description": "Thick Film Resistors - SMD 1K OHM 1%",
        "Package": "0603",
        "MPN": "RC0603FR-071KL",
        "Distributor Part Number": "603-RC0603FR-071KL",
        "Manufacturer": "YAGEO",
        "Value": "1k",
        "Voltage": "",
        "Stock": 5000,
        "Price": 0.1,
        "Lifecycle": "Active",
        "Product URL": "https://example.test/p/603-RC0603FR-071KL"
      }
    ]);
  });

  it("round-trips through a JSON snapshot", () => {
    const session = sessionWithCandidates();
    session.selectCandidate(1, "603-ALT");

    const snapshot: BomSessionSnapshot = JSON.parse(JSON.stringify(session.toSnapshot()));
    const restored = BomSession.fromSnapshot(snapshot);

    expect(snapshot.version).toBe("1.0");
    expect(restored.lineItems()).toEqual(session.lineItems());
    expect(restored.rankedCandidates(1)).toEqual(session.rankedCandidates(1));
    expect(restored.skippedCandidates(1)).toEqual(session.skippedCandidates(1));
    expect(restored.exportRows()).toEqual(session.exportRows());
  });

  it("rejects snapshots it cannot read", () => {
    const snapshot = sessionWithCandidates().toSnapshot();

    const future: BomSessionSnapshot = JSON.parse(JSON.stringify({ ...snapshot, version: "2.0" }));
    expect(() => BomSession.fromSnapshot(future)).toThrow(SessionError);

    const orphaned: BomSessionSnapshot = JSON.parse(
      JSON.stringify({ ...snapshot, candidates: { "42": { ranked: [], skipped: [] } } })
    );
    expect(() => BomSession.fromSnapshot(orphaned)).toThrow(SessionError);
  });
});
