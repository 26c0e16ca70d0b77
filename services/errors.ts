// services/errors.ts

/** The header row of a BOM table has no usable columns. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

/** A raw catalog record lacks the identity fields needed to rank or select it. */
export class CandidateParseError extends Error {
  constructor(
    message: string,
    readonly recordIndex: number
  ) {
    super(message);
    this.name = "CandidateParseError";
  }
}

export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionError";
  }
}

export class CatalogRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = "CatalogRequestError";
  }
}
