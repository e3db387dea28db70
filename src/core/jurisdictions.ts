export const KNOWN_JURISDICTIONS = [
  "United States",
  "European Union",
  "United Kingdom",
  "Canada",
] as const;

export type KnownJurisdiction = (typeof KNOWN_JURISDICTIONS)[number];

// Shared by the workbook import and the dashboard filters so both sides
// agree on one spelling per jurisdiction.
const aliases: Record<KnownJurisdiction, string[]> = {
  "United States": [
    "US",
    "USA",
    "U.S.",
    "U.S.A.",
    "United States of America",
    "America",
  ],
  "European Union": ["EU", "E.U.", "Europe"],
  "United Kingdom": ["UK", "U.K.", "Great Britain", "Britain"],
  Canada: ["CA", "CAN"],
};

function aliasKey(name: string) {
  return name.trim().toLowerCase().replace(/\./g, "").replace(/\s+/g, " ");
}

const aliasMap = new Map<string, KnownJurisdiction>();
for (const canonical of KNOWN_JURISDICTIONS) {
  aliasMap.set(aliasKey(canonical), canonical);
  for (const alias of aliases[canonical]) {
    aliasMap.set(aliasKey(alias), canonical);
  }
}

/** Maps a spelling variant to its canonical name; unknown names come back trimmed. */
export function canonicalJurisdiction(raw: string): string {
  return aliasMap.get(aliasKey(raw)) ?? raw.trim();
}

export function isKnownJurisdiction(name: string): name is KnownJurisdiction {
  return KNOWN_JURISDICTIONS.some((known) => known === name);
}
