// Shared TypeScript types for the score table, the legislation workbook
// and the relational import.

export const SCORE_INDUSTRIES = [
  "Luxury",
  "Entertainment",
  "Pharmaceuticals",
  "Technology",
  "Fintech",
] as const;

export type ScoreIndustry = (typeof SCORE_INDUSTRIES)[number];

export const ALL_INDUSTRIES = "All Industries";

export type Industry = typeof ALL_INDUSTRIES | ScoreIndustry;

export const INDUSTRIES: readonly Industry[] = [ALL_INDUSTRIES, ...SCORE_INDUSTRIES];

/** Spreadsheet headers, as they appear in the legislation workbook. */
export const WORKBOOK_COLUMNS = {
  jurisdiction: "Jurisdiction",
  law: "Law/Subprovision",
  significance: "Significance",
  relevantIndustry: "Relevant Industry",
  innovationStage: "Innovation Stage",
  enforceability: "Enforceability",
  riskScore: "Risk Score",
} as const;

export type WorkbookField = keyof typeof WORKBOOK_COLUMNS;

export const REQUIRED_FIELDS = ["jurisdiction", "law", "significance"] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/** One data row of the legislation workbook; blank cells are null. */
export type LegislationRow = {
  rowNumber: number;
} & Record<WorkbookField, string | null>;

export type ScoreRow = {
  jurisdiction: string;
  score: number;
  explanation: string;
};

export type LegislationViewRow = {
  jurisdiction: string;
  law: string | null;
  significance: string | null;
  innovationStage: string | null;
  enforceability: string | null;
  riskScore: string | null;
};

export type TableCounts = {
  jurisdictions: number;
  sectors: number;
  laws: number;
  barriers: number;
};
