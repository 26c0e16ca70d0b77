// services/refDes.ts

const REFDES_DELIMITERS = /[,;\s]+/;
const REFDES_PATTERN = /^([A-Za-z_]*)(\d*)(.*)$/;

export function splitRefDes(raw: string): string[] {
  return raw
    .split(REFDES_DELIMITERS)
    .map(token => token.trim())
    .filter(Boolean);
}

interface RefDesParts {
  prefix: string;
  number: number | null;
  rest: string;
}

function parseRefDes(token: string): RefDesParts {
  const match = REFDES_PATTERN.exec(token);
  // The pattern matches every string; the fallback only satisfies the type.
  if (!match) return { prefix: token.toUpperCase(), number: null, rest: "" };

  const [, prefix, digits, rest] = match;
  return {
    prefix: prefix.toUpperCase(),
    number: digits ? Number.parseInt(digits, 10) : null,
    rest: rest.toUpperCase()
  };
}

/**
 * Natural designator order: alpha prefix, then numeric suffix, then whatever
 * follows the number ("U1A" after "U1"). C2 sorts before C10.
 */
export function compareRefDes(a: string, b: string): number {
  const pa = parseRefDes(a);
  const pb = parseRefDes(b);

  if (pa.prefix !== pb.prefix) return pa.prefix < pb.prefix ? -1 : 1;

  if (pa.number !== pb.number) {
    if (pa.number === null) return -1;
    if (pb.number === null) return 1;
    return pa.number - pb.number;
  }

  if (pa.rest !== pb.rest) return pa.rest < pb.rest ? -1 : 1;

  // Same designator up to case: keep a total order.
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Designators differing only in case are one part; the first spelling is kept.
export function sortRefDes(list: readonly string[]): string[] {
  const unique = new Map<string, string>();
  for (const token of list) {
    const key = token.toUpperCase();
    if (!unique.has(key)) unique.set(key, token);
  }
  return Array.from(unique.values()).sort(compareRefDes);
}
