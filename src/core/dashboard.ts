import { filterLegislation } from "./legislation.js";
import { canonicalJurisdiction, isKnownJurisdiction } from "./jurisdictions.js";
import { logWarn } from "./logger.js";
import {
  filterScores,
  innovationScores,
  parseIndustry,
  rankScores,
} from "./scores.js";
import type {
  Industry,
  LegislationRow,
  LegislationViewRow,
  ScoreRow,
} from "./types.js";

export type DashboardView = {
  title: string;
  industry: Industry;
  jurisdictions: string[];
  scores: ScoreRow[];
  ranked: ScoreRow[];
  legislation: LegislationViewRow[];
};

export type DashboardInput = {
  industry?: string;
  /** Omitted or empty selects every jurisdiction in the score table. */
  jurisdictions?: readonly string[];
  legislation: LegislationRow[];
};

export function parseJurisdictionList(csv?: string): string[] {
  if (!csv) return [];
  return csv
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function buildDashboardView(input: DashboardInput): DashboardView {
  const industry = parseIndustry(input.industry);
  const all = innovationScores(industry);

  // Nothing selected means every jurisdiction in the score table.
  const jurisdictions = input.jurisdictions?.length
    ? [...new Set(input.jurisdictions.map(canonicalJurisdiction))]
    : all.map((r) => r.jurisdiction);
  for (const name of jurisdictions) {
    if (!isKnownJurisdiction(name)) {
      logWarn(`No innovation scores for jurisdiction "${name}"`);
    }
  }

  const scores = filterScores(all, jurisdictions);
  return {
    title: industry,
    industry,
    jurisdictions,
    scores,
    ranked: rankScores(scores),
    legislation: filterLegislation(input.legislation, {
      industry,
      jurisdictions,
    }),
  };
}

/** "All Industries" -> "all_industries" */
export function fileSlug(title: string) {
  return title.toLowerCase().replace(/ /g, "_");
}
