import fs from "fs-extra";
import path from "node:path";
import { legislationCsv, scoresCsv } from "../writers/csv.js";
import { renderPdf, type PdfRunner } from "../writers/pdf.js";
import { buildReportHtml } from "../writers/report.js";
import { fileSlug, type DashboardView } from "./dashboard.js";
import { emitEngineEvent, type EngineEventListener } from "./events.js";
import { logDebug, logInfo, logWarn } from "./logger.js";

export type ExportFormat = "csv" | "html" | "pdf";

export type ExportOptions = {
  view: DashboardView;
  outDir: string;
  formats?: string;
  /** Resolved wkhtmltopdf binary; null disables PDF output. */
  wkhtmltopdf: string | null;
  runPdf?: PdfRunner;
  dryRun?: boolean;
  debug?: boolean;
  onEvent?: EngineEventListener;
};

export type ExportResult = {
  written: string[];
  planned: string[];
  skipped: { format: ExportFormat; reason: string }[];
};

export function parseFormats(formats?: string): ExportFormat[] {
  if (!formats || !formats.trim()) return ["csv", "pdf"];
  const out: ExportFormat[] = [];
  for (const p of formats.split(",").map((s) => s.trim().toLowerCase())) {
    if ((p === "csv" || p === "html" || p === "pdf") && !out.includes(p)) {
      out.push(p);
    }
  }
  return out.length ? out : ["csv", "pdf"];
}

export function exportFileNames(view: DashboardView) {
  const slug = fileSlug(view.title);
  return {
    scoresCsv: `${slug}_innovation_scores.csv`,
    legislationCsv: `${slug}_legislation.csv`,
    html: `${slug}_innovation_report.html`,
    pdf: `${slug}_innovation_report.pdf`,
  };
}

export async function exportView(opts: ExportOptions): Promise<ExportResult> {
  const {
    view,
    outDir,
    wkhtmltopdf,
    runPdf,
    dryRun = false,
    debug = false,
    onEvent,
  } = opts;
  const formats = parseFormats(opts.formats);
  const names = exportFileNames(view);
  const result: ExportResult = { written: [], planned: [], skipped: [] };

  const targets: { format: ExportFormat; file: string }[] = [];
  if (formats.includes("csv")) {
    targets.push({ format: "csv", file: names.scoresCsv });
    targets.push({ format: "csv", file: names.legislationCsv });
  }
  if (formats.includes("html")) targets.push({ format: "html", file: names.html });
  if (formats.includes("pdf")) targets.push({ format: "pdf", file: names.pdf });

  if (dryRun) {
    result.planned = targets.map((t) => path.join(outDir, t.file));
    logInfo("[export][dry-run]", { outDir, files: result.planned });
    return result;
  }

  await fs.ensureDir(outDir);
  const written = (file: string) => {
    result.written.push(file);
    emitEngineEvent({ type: "artifact-written", file }, onEvent);
  };

  const html =
    formats.includes("html") || formats.includes("pdf")
      ? buildReportHtml(view)
      : "";

  for (const { format, file } of targets) {
    const dest = path.join(outDir, file);
    logDebug(debug, `[export] ${format}`, { out: dest });
    if (format === "csv") {
      const csv =
        file === names.scoresCsv
          ? scoresCsv(view.scores)
          : legislationCsv(view.legislation);
      await fs.writeFile(dest, csv, "utf8");
      written(dest);
    } else if (format === "html") {
      await fs.writeFile(dest, html, "utf8");
      written(dest);
    } else {
      const pdf = await renderPdf(html, dest, {
        binary: wkhtmltopdf,
        run: runPdf,
      });
      if (pdf.status === "written") {
        written(pdf.file);
      } else {
        logWarn(pdf.reason);
        result.skipped.push({ format, reason: pdf.reason });
        emitEngineEvent(
          { type: "warning", file: dest, data: { reason: pdf.reason } },
          onEvent,
        );
      }
    }
  }
  return result;
}
