import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { canonicalJurisdiction } from "./jurisdictions.js";
import {
  ALL_INDUSTRIES,
  INDUSTRIES,
  SCORE_INDUSTRIES,
  type Industry,
  type ScoreRow,
} from "./types.js";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(moduleDir, "..", "..");

const SCORE_FILE = "innovation-scores.json";

const score = z.number().min(0).max(10);

const scoreTableSchema = z.object({
  jurisdictions: z
    .array(
      z.object({
        name: z.string().min(1),
        scores: z.object({
          Luxury: score,
          Entertainment: score,
          Pharmaceuticals: score,
          Technology: score,
          Fintech: score,
        }),
        explanation: z.string(),
      }),
    )
    .min(1),
});

export type ScoreTable = z.infer<typeof scoreTableSchema>;

let cached: ScoreTable | null = null;

export function loadScoreTable(): ScoreTable {
  if (cached) return cached;
  const candidates = [
    // Source tree (and tests)
    path.join(moduleDir, "..", "data", SCORE_FILE),
    // Compiled CLI under dist/ reading the shipped source data
    path.join(projectRoot, "src", "data", SCORE_FILE),
  ];
  for (const candidate of candidates) {
    if (!fs.pathExistsSync(candidate)) continue;
    const parsed = scoreTableSchema.safeParse(fs.readJsonSync(candidate));
    if (!parsed.success) {
      throw new Error(
        `Invalid score table ${candidate}: ${parsed.error.issues
          .map((i) => `${i.path.join(".")} ${i.message}`)
          .join("; ")}`,
      );
    }
    cached = parsed.data;
    return cached;
  }
  throw new Error(`Score table not found: ${SCORE_FILE}`);
}

export function roundScore(value: number) {
  return Math.round(value * 100) / 100;
}

/** Display form shared by the terminal, the CSV and the report. */
export function formatScore(value: number) {
  return value.toFixed(2);
}

export function isIndustry(value: string): value is Industry {
  return INDUSTRIES.some((i) => i === value);
}

/** Case-insensitive lookup; omitted means "All Industries". */
export function parseIndustry(value?: string): Industry {
  if (!value || !value.trim()) return ALL_INDUSTRIES;
  const wanted = value.trim().toLowerCase();
  const match = INDUSTRIES.find((i) => i.toLowerCase() === wanted);
  if (!match) {
    throw new Error(
      `Unknown industry "${value}". Expected one of: ${INDUSTRIES.join(", ")}`,
    );
  }
  return match;
}

export function innovationScores(
  industry: Industry,
  table: ScoreTable = loadScoreTable(),
): ScoreRow[] {
  return table.jurisdictions.map((j) => {
    const raw =
      industry === ALL_INDUSTRIES
        ? SCORE_INDUSTRIES.reduce((sum, i) => sum + j.scores[i], 0) /
          SCORE_INDUSTRIES.length
        : j.scores[industry];
    return {
      jurisdiction: canonicalJurisdiction(j.name),
      score: roundScore(raw),
      explanation: j.explanation,
    };
  });
}

export function filterScores(
  rows: ScoreRow[],
  jurisdictions: readonly string[],
): ScoreRow[] {
  const selected = new Set(jurisdictions.map(canonicalJurisdiction));
  return rows.filter((r) => selected.has(r.jurisdiction));
}

/** Highest score first; ties keep table order. */
export function rankScores(rows: ScoreRow[]): ScoreRow[] {
  return [...rows].sort((a, b) => b.score - a.score);
}
