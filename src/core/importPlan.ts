import { canonicalJurisdiction } from "./jurisdictions.js";
import {
  REQUIRED_FIELDS,
  type LegislationRow,
  type RequiredField,
} from "./types.js";

export const LAW_TYPE = "Mixed";
export const DEFAULT_ENFORCEABILITY = "Unrated";
export const BARRIER_RISK_SCORE = 5;
export const DEFAULT_STAGE = "General";

export type PlannedLaw = {
  rowNumber: number;
  jurisdiction: string;
  name: string;
  summary: string;
  stage: string;
  sectors: string[];
};

export type DroppedRow = {
  rowNumber: number;
  missing: RequiredField[];
};

/**
 * Two-phase import: reference tables (jurisdictions, sectors) are written
 * first, dependent rows (laws and their barriers) second.
 */
export type ImportPlan = {
  jurisdictions: string[];
  sectors: string[];
  laws: PlannedLaw[];
  dropped: DroppedRow[];
};

export function splitIndustries(cell: string | null): string[] {
  if (!cell) return [];
  const out: string[] = [];
  for (const token of cell.split(/[,;]/)) {
    const name = token.trim();
    if (name && !out.includes(name)) out.push(name);
  }
  return out;
}

export function barrierDescription(stage: string, sector: string) {
  return `Relevant to ${stage} stage in ${sector}`;
}

export function buildImportPlan(rows: LegislationRow[]): ImportPlan {
  const jurisdictions = new Set<string>();
  const sectors = new Set<string>();
  const laws: PlannedLaw[] = [];
  const dropped: DroppedRow[] = [];

  for (const row of rows) {
    const missing = REQUIRED_FIELDS.filter((f) => row[f] === null);
    const { jurisdiction, law, significance } = row;
    if (missing.length || !jurisdiction || !law || !significance) {
      dropped.push({ rowNumber: row.rowNumber, missing });
      continue;
    }

    const canonical = canonicalJurisdiction(jurisdiction);
    const rowSectors = splitIndustries(row.relevantIndustry);
    jurisdictions.add(canonical);
    for (const s of rowSectors) sectors.add(s);

    laws.push({
      rowNumber: row.rowNumber,
      jurisdiction: canonical,
      name: law,
      summary: significance,
      stage: row.innovationStage ?? DEFAULT_STAGE,
      sectors: rowSectors,
    });
  }

  return {
    jurisdictions: [...jurisdictions],
    sectors: [...sectors],
    laws,
    dropped,
  };
}
