import { describe, expect, it } from "vitest";
import { headerMatchKey, matchCanonicalField, normalizeHeaders } from "../services/schemaNormalizer.js";
import { SchemaError } from "../services/errors.js";

describe("header matching", () => {
  it("maps every alias of a field to the same key", () => {
    for (const header of ["Ref", "Reference Designator", "REFDES", "Ref Des", "designators"]) {
      expect(matchCanonicalField(header)).toBe("refDes");
    }
    expect(matchCanonicalField("Mfr Part Number")).toBe("mpn");
    expect(matchCanonicalField("Part#")).toBe("mpn");
    expect(matchCanonicalField(" Qty Per Board ")).toBe("quantity");
    expect(matchCanonicalField("Footprint")).toBe("package");
  });

  it("ignores case and whitespace", () => {
    expect(headerMatchKey("  Manufacturer   Part Number ")).toBe("manufacturerpartnumber");
  });

  it("returns null for unknown headers", () => {
    expect(matchCanonicalField("Supplier")).toBeNull();
  });
});

describe("normalizeHeaders", () => {
  it("keeps unmatched columns as Other", () => {
    const columns = normalizeHeaders(["RefDes", "MPN", "Value", "Supplier "]);

    expect(columns.map(c => c.key)).toEqual([
      { kind: "canonical", field: "refDes" },
      { kind: "canonical", field: "mpn" },
      { kind: "canonical", field: "value" },
      { kind: "other", name: "Supplier" }
    ]);
    expect(columns[3].header).toBe("Supplier");
  });

  it("keeps the first column for a repeated field and flags the rest", () => {
    const columns = normalizeHeaders(["MPN", "Part Number"]);

    expect(columns[0].key).toEqual({ kind: "canonical", field: "mpn" });
    expect(columns[1].key).toEqual({ kind: "other", name: "Part Number" });
    expect(columns[1].duplicateOf).toBe("mpn");
  });

  it("names blank headers by index and suffixes repeated Other names", () => {
    const columns = normalizeHeaders(["MPN", "", null, "Color", "Color"]);

    expect(columns.map(c => c.key)).toEqual([
      { kind: "canonical", field: "mpn" },
      { kind: "other", name: "col_1" },
      { kind: "other", name: "col_2" },
      { kind: "other", name: "Color" },
      { kind: "other", name: "Color_2" }
    ]);
  });

  it("rejects empty header rows", () => {
    expect(() => normalizeHeaders([])).toThrow(SchemaError);
    expect(() => normalizeHeaders(["", "   ", null])).toThrow(SchemaError);
  });
});
