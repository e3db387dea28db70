import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import Papa from "papaparse";
import { buildDashboardView, type DashboardView } from "../src/core/dashboard.js";
import { exportFileNames, exportView, parseFormats } from "../src/core/exportView.js";
import { parseWorkbook } from "../src/extractors/workbook.js";
import { legislationCsv, scoresCsv } from "../src/writers/csv.js";
import type { PdfRunner } from "../src/writers/pdf.js";
import { buildReportHtml, buildReportMarkdown, escapeCell } from "../src/writers/report.js";
import { legislationRow, workbookBuffer } from "./fixtures.js";

const { rows } = parseWorkbook(workbookBuffer());

function fintechView(jurisdictions?: string[]): DashboardView {
  return buildDashboardView({ industry: "Fintech", jurisdictions, legislation: rows });
}

describe("csv writers", () => {
  it("round-trips the displayed jurisdiction/score pairs", () => {
    const view = buildDashboardView({ legislation: rows });
    const parsed = Papa.parse<Record<string, string>>(scoresCsv(view.scores), {
      header: true,
      skipEmptyLines: true,
    });
    expect(parsed.errors).toEqual([]);
    expect(
      parsed.data.map((r) => [r["Jurisdiction"], Number(r["Innovation Score"])]),
    ).toEqual(view.scores.map((r) => [r.jurisdiction, r.score]));
    expect(parsed.data[0]?.["Explanation"]).toBe(view.scores[0]?.explanation);
  });

  it("writes scores with the two decimals shown on screen", () => {
    const view = fintechView(["United States"]);
    const parsed = Papa.parse<Record<string, string>>(scoresCsv(view.scores), {
      header: true,
      skipEmptyLines: true,
    });
    expect(parsed.data.map((r) => r["Innovation Score"])).toEqual(["8.10"]);
  });

  it("writes the legislation header and blanks for empty cells", () => {
    const view = fintechView(["European Union"]);
    const lines = legislationCsv(view.legislation).split("\r\n");
    expect(lines).toEqual([
      "Jurisdiction,Law/Subprovision,Significance,Innovation Stage,Enforceability,Risk Score",
      "European Union,Automated Decisions Article,Limits automated decision-making on personal data,,High,8",
    ]);
  });
});

describe("report writer", () => {
  it("renders the score summary without explanations", () => {
    const html = buildReportHtml(fintechView(["United Kingdom"]));
    expect(html).toContain("<h1>Innovation Score Summary – Fintech</h1>");
    expect(html).toContain("<td>United Kingdom</td>");
    expect(html).toContain("<td>8.80</td>");
    expect(html).toContain("<h2>Relevant Laws &amp; Barriers – Fintech</h2>");
    expect(html).toContain("<td>Payments Sandbox Rules</td>");
    expect(html).not.toContain("post-Brexit");
  });

  it("notes when no legislation matches", () => {
    const md = buildReportMarkdown(fintechView(["Canada"]));
    expect(md.split("\n")).toContain("*No legislation found for this combination.*");
    expect(md).not.toContain("## Relevant Laws");
  });

  it("reproduces legislation text without markdown formatting", () => {
    const view = buildDashboardView({
      industry: "Fintech",
      jurisdictions: ["United States"],
      legislation: [
        legislationRow(2, {
          jurisdiction: "United States",
          law: "Bank Act *s.5* and Article [5](1)",
          significance: "R&D <b>credits</b> _apply_ | #1",
          relevantIndustry: "Fintech",
        }),
      ],
    });
    const html = buildReportHtml(view);
    expect(html).toContain("<td>8.10</td>");
    expect(html).toContain("<td>Bank Act *s.5* and Article [5](1)</td>");
    expect(html).toContain(
      "<td>R&amp;D &lt;b&gt;credits&lt;/b&gt; _apply_ | #1</td>",
    );
  });

  it("escapes table delimiters in cells", () => {
    expect(escapeCell("a|b")).toBe("a\\|b");
    expect(escapeCell("*s.5*")).toBe("\\*s\\.5\\*");
    expect(escapeCell("line\nbreak")).toBe("line break");
    expect(escapeCell(null)).toBe("");
  });
});

describe("exportView", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "innodash-export-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tmp);
  });

  it("parses format lists", () => {
    expect(parseFormats("PDF, html,bogus")).toEqual(["pdf", "html"]);
    expect(parseFormats("")).toEqual(["csv", "pdf"]);
    expect(parseFormats("bogus")).toEqual(["csv", "pdf"]);
  });

  it("names files after the view title", () => {
    expect(exportFileNames(buildDashboardView({ legislation: [] }))).toEqual({
      scoresCsv: "all_industries_innovation_scores.csv",
      legislationCsv: "all_industries_legislation.csv",
      html: "all_industries_innovation_report.html",
      pdf: "all_industries_innovation_report.pdf",
    });
  });

  it("writes csv, html and pdf through the renderer", async () => {
    const calls: { binary: string; args: string[]; input: string }[] = [];
    const runPdf: PdfRunner = async (binary, args, input) => {
      calls.push({ binary, args, input });
    };
    const view = fintechView();
    const result = await exportView({
      view,
      outDir: tmp,
      formats: "csv,html,pdf",
      wkhtmltopdf: "/opt/tools/wkhtmltopdf",
      runPdf,
    });

    const pdf = path.join(tmp, "fintech_innovation_report.pdf");
    expect(result.written).toEqual([
      path.join(tmp, "fintech_innovation_scores.csv"),
      path.join(tmp, "fintech_legislation.csv"),
      path.join(tmp, "fintech_innovation_report.html"),
      pdf,
    ]);
    expect(result.skipped).toEqual([]);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.binary).toBe("/opt/tools/wkhtmltopdf");
    expect(calls[0]?.args).toEqual(["--quiet", "--encoding", "utf-8", "-", pdf]);
    expect(calls[0]?.input).toBe(buildReportHtml(view));

    const csv = await fs.readFile(path.join(tmp, "fintech_innovation_scores.csv"), "utf8");
    expect(csv.split("\r\n")[0]).toBe("Jurisdiction,Innovation Score,Explanation");
  });

  it("skips the pdf with a warning when no renderer is available", async () => {
    const result = await exportView({
      view: fintechView(),
      outDir: tmp,
      wkhtmltopdf: null,
    });
    expect(result.written).toEqual([
      path.join(tmp, "fintech_innovation_scores.csv"),
      path.join(tmp, "fintech_legislation.csv"),
    ]);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]?.format).toBe("pdf");
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(await fs.pathExists(path.join(tmp, "fintech_innovation_report.pdf"))).toBe(false);
  });

  it("only plans files on a dry run", async () => {
    const out = path.join(tmp, "nested");
    const result = await exportView({
      view: fintechView(),
      outDir: out,
      formats: "html",
      wkhtmltopdf: null,
      dryRun: true,
    });
    expect(result.planned).toEqual([path.join(out, "fintech_innovation_report.html")]);
    expect(result.written).toEqual([]);
    expect(await fs.pathExists(out)).toBe(false);
  });
});
