// services/packageMatch.ts

export type PackageMatch = "exact" | "equivalent" | "none";

// Imperial chip code -> metric chip code.
const CHIP_SIZES: Record<string, string> = {
  "0201": "0603",
  "0402": "1005",
  "0603": "1608",
  "0805": "2012",
  "1206": "3216",
  "1210": "3225",
  "1812": "4532",
  "2010": "5025",
  "2512": "6332"
};

const METRIC_TO_IMPERIAL: Record<string, string> = Object.fromEntries(
  Object.entries(CHIP_SIZES).map(([imperial, metric]) => [metric, imperial])
);

// Names of the same outline used by different vendors, already normalized.
const PACKAGE_ALIAS_GROUPS: string[][] = [
  ["SOT23", "SOT233", "TO236", "TO236AB"],
  ["SOIC8", "SO8", "8SOIC"],
  ["SMA", "DO214AC"],
  ["SMB", "DO214AA"],
  ["SMC", "DO214AB"],
  ["SOD123"],
  ["SOT223", "TO261", "TO261AA"],
  ["DPAK", "TO252", "TO252AA"],
  ["D2PAK", "TO263", "TO263AB"]
];

const ALIAS_FAMILY = new Map<string, string>(
  PACKAGE_ALIAS_GROUPS.flatMap(group => group.map(alias => [alias, `alias:${group[0]}`] as const))
);

export function normalizePackage(value: string | null | undefined): string {
  if (!value) return "";
  return value.toUpperCase().replace(/[\s\-_]/g, "");
}

function chipFamilies(value: string): Set<string> {
  const families = new Set<string>();
  const tokens = value.toUpperCase().split(/[^A-Z0-9]+/).filter(Boolean);

  tokens.forEach((token, i) => {
    const metricSuffixed = /^(\d{4})M(?:ETRIC)?$/.exec(token);
    if (metricSuffixed) {
      const imperial = METRIC_TO_IMPERIAL[metricSuffixed[1]];
      if (imperial) families.add(`chip:${imperial}`);
      return;
    }

    if (!/^\d{4}$/.test(token)) return;

    const next = tokens[i + 1];
    if (next === "METRIC" || next === "M") {
      const imperial = METRIC_TO_IMPERIAL[token];
      if (imperial) families.add(`chip:${imperial}`);
    } else if (token in CHIP_SIZES) {
      families.add(`chip:${token}`);
    }
  });

  return families;
}

function aliasFamilies(value: string): Set<string> {
  const families = new Set<string>();
  for (const segment of value.split(/[,;/()]+/)) {
    const family = ALIAS_FAMILY.get(normalizePackage(segment));
    if (family) families.add(family);
  }
  return families;
}

/**
 * Outline families a package string belongs to: chip sizes (imperial and
 * metric codes resolve to the same family) and named vendor aliases.
 */
export function packageFamilies(value: string | null | undefined): Set<string> {
  if (!value) return new Set();
  return new Set([...chipFamilies(value), ...aliasFamilies(value)]);
}

function intersects(a: Set<string>, b: Set<string>): boolean {
  for (const item of a) {
    if (b.has(item)) return true;
  }
  return false;
}

function onlyChips(families: Set<string>): Set<string> {
  return new Set([...families].filter(f => f.startsWith("chip:")));
}

export function matchPackage(required: string | null | undefined, offered: string | null | undefined): PackageMatch {
  const a = normalizePackage(required);
  const b = normalizePackage(offered);
  if (!a || !b) return "none";
  if (a === b) return "exact";

  const familiesA = packageFamilies(required);
  const familiesB = packageFamilies(offered);
  if (intersects(familiesA, familiesB)) return "equivalent";

  // Two different chip sizes never match, even if one string contains the other.
  const chipsA = onlyChips(familiesA);
  const chipsB = onlyChips(familiesB);
  if (chipsA.size > 0 && chipsB.size > 0) return "none";

  const shorter = a.length <= b.length ? a : b;
  if (shorter.length >= 3 && containsOutline(packageTokens(required), packageTokens(offered))) {
    return "equivalent";
  }
  return "none";
}

function packageTokens(value: string | null | undefined): string[] {
  return (value ?? "").toUpperCase().split(/[^A-Z0-9]+/).filter(Boolean);
}

/**
 * True when the tokens of one outline appear whole and in order inside the
 * other, and what is left over names a variant ("EP") rather than a pin count.
 * "QFN-32" is inside "QFN-32-EP"; "SOT-23" is not inside "SOT-23-5".
 */
function containsOutline(a: string[], b: string[]): boolean {
  const [inner, outer] = a.length <= b.length ? [a, b] : [b, a];
  if (inner.length === 0 || inner.length === outer.length) return false;

  for (let start = 0; start + inner.length <= outer.length; start++) {
    if (!inner.every((token, i) => outer[start + i] === token)) continue;
    const rest = [...outer.slice(0, start), ...outer.slice(start + inner.length)];
    return rest.every(token => !/^\d+$/.test(token));
  }
  return false;
}
