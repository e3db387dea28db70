import * as XLSX from "xlsx";
import type { LegislationRow } from "../src/core/types.js";

export const HEADERS = [
  "Jurisdiction",
  "Law/Subprovision",
  "Significance",
  "Relevant Industry",
  "Innovation Stage",
  "Enforceability",
  "Risk Score",
];

export type Cell = string | number | null;

// Sheet rows 2..7; row 5 has no law name.
export const SAMPLE_ROWS: Cell[][] = [
  ["United States", "Copyright Act §107", "Permits transformative uses of protected works", "Entertainment, Technology", "Growth", "High", 7],
  ["UK", "Payments Sandbox Rules", "Lets payments firms test products under supervision", "Fintech", "Early", "Medium", 4],
  ["EU", "Automated Decisions Article", "Limits automated decision-making on personal data", "Technology; Fintech", null, "High", 8],
  ["Canada", null, "Row without a law name", "Luxury", "Mature", "Low", 2],
  [" Canada ", "Trademarks Act s.19", "Exclusive right to registered marks", "Luxury", "Mature", "Medium", 5],
  ["United States of America", "Electronic Records Rule", "Record-keeping rules for drug makers", "Pharmaceuticals", "Late", "High", 6],
];

export function workbookBuffer(
  rows: Cell[][] = SAMPLE_ROWS,
  headers: string[] = HEADERS,
  sheetName = "Laws",
): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([headers, ...rows]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, sheetName);
  return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
}

export function legislationRow(
  rowNumber: number,
  partial: Partial<Omit<LegislationRow, "rowNumber">> = {},
): LegislationRow {
  return {
    rowNumber,
    jurisdiction: null,
    law: null,
    significance: null,
    relevantIndustry: null,
    innovationStage: null,
    enforceability: null,
    riskScore: null,
    ...partial,
  };
}
