import { describe, expect, it } from "vitest";
import { matchPackage, normalizePackage, packageFamilies } from "../services/packageMatch.js";

describe("normalizePackage", () => {
  it("uppercases and drops separators", () => {
    expect(normalizePackage(" sot-23 ")).toBe("SOT23");
    expect(normalizePackage("SOIC_8")).toBe("SOIC8");
    expect(normalizePackage(null)).toBe("");
  });
});

describe("packageFamilies", () => {
  it("resolves imperial and metric chip codes to one family", () => {
    expect([...packageFamilies("0402 (1005 Metric)")]).toEqual(["chip:0402"]);
    expect([...packageFamilies("1608M")]).toEqual(["chip:0603"]);
  });

  it("resolves vendor aliases", () => {
    expect([...packageFamilies("TO-236AB")]).toEqual(["alias:SOT23"]);
  });
});

describe("matchPackage", () => {
  it("matches identical packages exactly", () => {
    expect(matchPackage("0603", "0603")).toBe("exact");
    expect(matchPackage("SOIC-8", "soic 8")).toBe("exact");
  });

  it("treats known equivalents as equivalent", () => {
    expect(matchPackage("0603", "0603 (1608 Metric)")).toBe("equivalent");
    expect(matchPackage("0603", "1608M")).toBe("equivalent");
    expect(matchPackage("SOT-23", "TO-236AB")).toBe("equivalent");
    expect(matchPackage("QFN-32", "QFN-32-EP")).toBe("equivalent");
  });

  it("does not credit a different outline that shares a prefix", () => {
    expect(matchPackage("SOT-23", "SOT-23-5")).toBe("none");
    expect(matchPackage("SMA", "SMAJ")).toBe("none");
    expect(matchPackage("TO-220", "TO-220F")).toBe("none");
  });

  it("never matches different chip sizes", () => {
    expect(matchPackage("0603", "0805")).toBe("none");
    expect(matchPackage("0603", "1206 (3216 Metric)")).toBe("none");
  });

  it("returns none when either side is missing", () => {
    expect(matchPackage("0603", "")).toBe("none");
    expect(matchPackage(null, "0603")).toBe("none");
  });
});
