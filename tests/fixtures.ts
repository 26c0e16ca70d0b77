import type { Candidate, ConsolidatedLineItem } from "../types.js";

export function makeLineItem(overrides: Partial<ConsolidatedLineItem> = {}): ConsolidatedLineItem {
  return {
    id: 1,
    mergeKey: "row:0",
    fields: {},
    otherFields: {},
    refDesList: [],
    quantity: 1,
    sourceRows: [0],
    conflicts: [],
    selectedCandidateId: null,
    ...overrides
  };
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    candidateId: "C-1",
    partNumber: "PART-1",
    manufacturer: "Acme",
    description: "",
    package: null,
    unitPrice: 1,
    priceBreaks: [{ quantity: 1, price: 1 }],
    stockQuantity: 100,
    lifecycleStatus: "Active",
    attributes: {},
    distributorPartNumber: null,
    productUrl: null,
    datasheetUrl: null,
    currency: null,
    leadTime: null,
    ...overrides
  };
}

// Mouser-shaped search result record.
export function mouserPart(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    ManufacturerPartNumber: "RC0603FR-071KL",
    Manufacturer: "YAGEO",
    MouserPartNumber: "603-RC0603FR-071KL",
    Description: "Thick Film Resistors - SMD 1K OHM 1%",
    AvailabilityInStock: "5000",
    LifecycleStatus: "New Product",
    PriceBreaks: [
      { Quantity: 1, Price: "$0.10", Currency: "USD" },
      { Quantity: 10, Price: "$0.05", Currency: "USD" }
    ],
    ProductAttributes: [{ AttributeName: "Packaging", AttributeValue: "Reel" }],
    ProductDetailUrl: "https://example.test/p/603-RC0603FR-071KL",
    DataSheetUrl: "https://example.test/ds/rc0603.pdf",
    ...overrides
  };
}
