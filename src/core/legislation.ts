import { canonicalJurisdiction } from "./jurisdictions.js";
import {
  ALL_INDUSTRIES,
  WORKBOOK_COLUMNS,
  type Industry,
  type LegislationRow,
  type LegislationViewRow,
} from "./types.js";

/** Columns shown (and exported) for legislation, in display order. */
export const LEGISLATION_VIEW_COLUMNS: {
  key: keyof LegislationViewRow;
  header: string;
}[] = [
  { key: "jurisdiction", header: WORKBOOK_COLUMNS.jurisdiction },
  { key: "law", header: WORKBOOK_COLUMNS.law },
  { key: "significance", header: WORKBOOK_COLUMNS.significance },
  { key: "innovationStage", header: WORKBOOK_COLUMNS.innovationStage },
  { key: "enforceability", header: WORKBOOK_COLUMNS.enforceability },
  { key: "riskScore", header: WORKBOOK_COLUMNS.riskScore },
];

export type LegislationFilter = {
  industry: Industry;
  jurisdictions: readonly string[];
};

export function matchesIndustry(cell: string | null, industry: Industry) {
  if (industry === ALL_INDUSTRIES) return true;
  if (!cell) return false;
  return cell.toLowerCase().includes(industry.toLowerCase());
}

export function filterLegislation(
  rows: LegislationRow[],
  filter: LegislationFilter,
): LegislationViewRow[] {
  const selected = new Set(filter.jurisdictions.map(canonicalJurisdiction));
  const out: LegislationViewRow[] = [];
  for (const row of rows) {
    if (!row.jurisdiction) continue;
    const jurisdiction = canonicalJurisdiction(row.jurisdiction);
    if (!selected.has(jurisdiction)) continue;
    if (!matchesIndustry(row.relevantIndustry, filter.industry)) continue;
    out.push({
      jurisdiction,
      law: row.law,
      significance: row.significance,
      innovationStage: row.innovationStage,
      enforceability: row.enforceability,
      riskScore: row.riskScore,
    });
  }
  return out;
}
