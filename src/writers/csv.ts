import Papa from "papaparse";
import { LEGISLATION_VIEW_COLUMNS } from "../core/legislation.js";
import { formatScore } from "../core/scores.js";
import type { LegislationViewRow, ScoreRow } from "../core/types.js";

export const SCORE_CSV_FIELDS = ["Jurisdiction", "Innovation Score", "Explanation"];

export function scoresCsv(rows: ScoreRow[]): string {
  return Papa.unparse({
    fields: SCORE_CSV_FIELDS,
    data: rows.map((r) => [r.jurisdiction, formatScore(r.score), r.explanation]),
  });
}

export function legislationCsv(rows: LegislationViewRow[]): string {
  return Papa.unparse({
    fields: LEGISLATION_VIEW_COLUMNS.map((c) => c.header),
    data: rows.map((r) => LEGISLATION_VIEW_COLUMNS.map((c) => r[c.key] ?? "")),
  });
}
