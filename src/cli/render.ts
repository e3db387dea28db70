import chalk from "chalk";
import type { DashboardView } from "../core/dashboard.js";
import type { ImportReport } from "../core/importer.js";
import { LEGISLATION_VIEW_COLUMNS } from "../core/legislation.js";
import { formatScore } from "../core/scores.js";
import type { ScoreRow } from "../core/types.js";

const CHART_WIDTH = 40;
const MAX_SCORE = 10;
const MAX_CELL = 48;

function clip(text: string, width: number) {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) =>
    Math.min(
      MAX_CELL,
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    ),
  );
  const line = (cells: string[]) =>
    cells.map((c, i) => clip(c, widths[i] ?? MAX_CELL).padEnd(widths[i] ?? 0)).join("  ").trimEnd();
  return [
    chalk.bold(line(headers)),
    widths.map((w) => "─".repeat(w)).join("  "),
    ...rows.map(line),
  ];
}

export function renderScoreTable(rows: ScoreRow[]): string[] {
  return renderTable(
    ["Jurisdiction", "Innovation Score", "Explanation"],
    rows.map((r) => [r.jurisdiction, formatScore(r.score), r.explanation]),
  );
}

/** Horizontal bars on a fixed 0–10 axis, in the order given. */
export function renderBarChart(rows: ScoreRow[], width = CHART_WIDTH): string[] {
  const nameWidth = Math.max(0, ...rows.map((r) => r.jurisdiction.length));
  return rows.map((r) => {
    const clamped = Math.min(MAX_SCORE, Math.max(0, r.score));
    const len = Math.round((clamped / MAX_SCORE) * width);
    const bar = chalk.cyan("█".repeat(len)) + " ".repeat(width - len);
    return `${r.jurisdiction.padEnd(nameWidth)} │${bar}│ ${formatScore(r.score)}`;
  });
}

export function renderDashboard(view: DashboardView): string[] {
  const out: string[] = [];
  out.push(chalk.bold(`Innovation Scores – ${view.title}`));
  out.push("");
  out.push(...renderScoreTable(view.scores));
  out.push("");
  out.push(chalk.bold(`Innovation Score by Jurisdiction – ${view.title}`));
  out.push(...renderBarChart(view.ranked));
  out.push("");
  out.push(chalk.bold(`Relevant Laws & Barriers – ${view.title}`));
  if (!view.legislation.length) {
    out.push("No matching legislation found.");
  } else {
    out.push(
      ...renderTable(
        LEGISLATION_VIEW_COLUMNS.map((c) => c.header),
        view.legislation.map((r) =>
          LEGISLATION_VIEW_COLUMNS.map((c) => r[c.key] ?? ""),
        ),
      ),
    );
  }
  return out;
}

export function renderImportReport(report: ImportReport): string[] {
  const { inserted, totals } = report;
  const out = [
    `Inserted: jurisdictions=${inserted.jurisdictions} sectors=${inserted.sectors} laws=${inserted.laws} barriers=${inserted.barriers}`,
    `Totals:   jurisdictions=${totals.jurisdictions} sectors=${totals.sectors} laws=${totals.laws} barriers=${totals.barriers}`,
  ];
  if (report.dropped.length) {
    out.push(
      chalk.yellow(
        `Dropped ${report.dropped.length} row(s) missing required fields: ${report.dropped
          .map((d) => d.rowNumber)
          .join(", ")}`,
      ),
    );
  }
  if (report.skippedLaws.length) {
    out.push(chalk.yellow(`Skipped ${report.skippedLaws.length} law(s) with unresolved jurisdiction`));
  }
  if (report.skippedLinks.length) {
    out.push(chalk.yellow(`Skipped ${report.skippedLinks.length} barrier link(s) with unresolved sector`));
  }
  return out;
}
