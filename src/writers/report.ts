import MarkdownIt from "markdown-it";
import type { DashboardView } from "../core/dashboard.js";
import { LEGISLATION_VIEW_COLUMNS } from "../core/legislation.js";
import { formatScore } from "../core/scores.js";

const REPORT_CSS = `
    body { font-family: Arial, sans-serif; color: #ffffff; background-color: #0e1117; }
    h1 { color: #00ccff; }
    h2 { color: #66d9ef; margin-top: 30px; }
    table { width: 100%; border-collapse: collapse; margin-top: 15px; }
    th, td { border: 1px solid #444; padding: 8px; font-size: 12px; color: #ffffff; }
    th { background-color: #333; }
`;

/** Cell text is literal: every ASCII punctuation mark is backslash-escaped. */
export function escapeCell(value: string | number | null) {
  if (value === null) return "";
  return String(value)
    .replace(/\r?\n/g, " ")
    .replace(/[!-\/:-@\[-`{-~]/g, "\\$&");
}

function markdownTable(headers: string[], rows: (string | number | null)[][]) {
  const lines = [
    `| ${headers.map(escapeCell).join(" | ")} |`,
    `|${headers.map(() => "---").join("|")}|`,
  ];
  for (const row of rows) {
    lines.push(`| ${row.map(escapeCell).join(" | ")} |`);
  }
  return lines.join("\n");
}

export function buildReportMarkdown(view: DashboardView): string {
  const parts: string[] = [];
  parts.push(`# Innovation Score Summary – ${view.title}`);
  parts.push("");
  parts.push(
    markdownTable(
      ["Jurisdiction", "Innovation Score"],
      view.scores.map((r) => [r.jurisdiction, formatScore(r.score)]),
    ),
  );
  parts.push("");
  if (view.legislation.length) {
    parts.push(`## Relevant Laws & Barriers – ${view.title}`);
    parts.push("");
    parts.push(
      markdownTable(
        LEGISLATION_VIEW_COLUMNS.map((c) => c.header),
        view.legislation.map((r) => LEGISLATION_VIEW_COLUMNS.map((c) => r[c.key])),
      ),
    );
  } else {
    parts.push("*No legislation found for this combination.*");
  }
  parts.push("");
  return parts.join("\n");
}

export function buildReportHtml(view: DashboardView): string {
  const md = new MarkdownIt({ html: false, linkify: false, typographer: false });
  const body = md.render(buildReportMarkdown(view));
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Innovation Report – ${md.utils.escapeHtml(view.title)}</title>
  <style>${REPORT_CSS}  </style>
</head>
<body>
${body}</body>
</html>
`;
}
