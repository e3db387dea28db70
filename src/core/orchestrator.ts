import fs from "fs-extra";
import { readWorkbook } from "../extractors/workbook.js";
import { integrityGate } from "../gates/integrity.js";
import {
  createSchema,
  hasSchema,
  openDatabase,
  tableCounts,
  type Db,
} from "../writers/database.js";
import { resolveWkhtmltopdf, type PdfRunner } from "../writers/pdf.js";
import type { DashboardContext } from "./context.js";
import { buildDashboardView, type DashboardView } from "./dashboard.js";
import { emitEngineEvent, type EngineEventListener } from "./events.js";
import { exportView, parseFormats, type ExportResult } from "./exportView.js";
import { importLegislation, type ImportReport } from "./importer.js";
import { buildImportPlan, type ImportPlan } from "./importPlan.js";
import { logDebug, logWarn } from "./logger.js";
import type { LegislationRow, TableCounts } from "./types.js";

/**
 * Opens the database for one stage. With `write`, the file is saved even when
 * `fn` throws, so transactions committed before the failure reach disk.
 */
async function withDatabase<T>(
  file: string,
  opts: { write: boolean },
  fn: (db: Db) => T,
): Promise<T> {
  const db = await openDatabase(file);
  try {
    return fn(db);
  } finally {
    if (opts.write) db.save();
    db.close();
  }
}

export async function setupDatabase(ctx: DashboardContext): Promise<TableCounts> {
  logDebug(ctx.flags.debug, "setup-db", { db: ctx.dbPath });
  return withDatabase(ctx.dbPath, { write: true }, (db) => {
    createSchema(db);
    return tableCounts(db);
  });
}

export type ImportRun = {
  plan: ImportPlan;
  report: ImportReport | null;
};

export async function runImport(
  ctx: DashboardContext,
  opts: { clean?: boolean; onEvent?: EngineEventListener } = {},
): Promise<ImportRun> {
  const { onEvent } = opts;
  emitEngineEvent({ type: "stage-start", stage: "load" }, onEvent);
  const { sheetName, rows } = await readWorkbook(ctx.workbook, {
    sheet: ctx.sheet,
  });
  emitEngineEvent(
    {
      type: "stage-end",
      stage: "load",
      success: true,
      data: { sheet: sheetName, rows: rows.length },
    },
    onEvent,
  );
  logDebug(ctx.flags.debug, "workbook loaded", {
    file: ctx.workbook,
    sheet: sheetName,
    rows: rows.length,
  });

  const plan = buildImportPlan(rows);
  if (ctx.flags.dryRun) {
    return { plan, report: null };
  }

  if (opts.clean && ctx.dbPath !== ":memory:" && (await fs.pathExists(ctx.dbPath))) {
    logDebug(ctx.flags.debug, "removing existing database", ctx.dbPath);
    await fs.remove(ctx.dbPath);
  }

  const report = await withDatabase(ctx.dbPath, { write: true }, (db) => {
    createSchema(db);
    return importLegislation(db, rows, { debug: ctx.flags.debug, onEvent });
  });
  return { plan, report };
}

export async function checkDatabase(ctx: DashboardContext): Promise<TableCounts> {
  return withDatabase(ctx.dbPath, { write: false }, (db) => {
    if (!hasSchema(db)) {
      throw new Error(
        `Database ${ctx.dbPath} has no legislation schema; run "innodash setup-db" first`,
      );
    }
    integrityGate(db);
    return tableCounts(db);
  });
}

async function loadLegislation(ctx: DashboardContext): Promise<LegislationRow[]> {
  if (!(await fs.pathExists(ctx.workbook))) {
    logWarn(
      `Workbook not found: ${ctx.workbook}; showing scores without legislation`,
    );
    return [];
  }
  const { rows } = await readWorkbook(ctx.workbook, { sheet: ctx.sheet });
  return rows;
}

export type ViewSelection = {
  industry?: string;
  jurisdictions?: string[];
};

export async function loadDashboard(
  ctx: DashboardContext,
  selection: ViewSelection,
): Promise<DashboardView> {
  const legislation = await loadLegislation(ctx);
  return buildDashboardView({ ...selection, legislation });
}

export async function runExport(
  ctx: DashboardContext,
  selection: ViewSelection & {
    formats?: string;
    runPdf?: PdfRunner;
    onEvent?: EngineEventListener;
  },
): Promise<ExportResult> {
  const view = await loadDashboard(ctx, selection);
  const wkhtmltopdf = parseFormats(selection.formats).includes("pdf")
    ? await resolveWkhtmltopdf(ctx.wkhtmltopdf)
    : null;
  logDebug(ctx.flags.debug, "wkhtmltopdf", wkhtmltopdf ?? "(not used)");
  return exportView({
    view,
    outDir: ctx.outDir,
    formats: selection.formats,
    wkhtmltopdf,
    runPdf: selection.runPdf,
    dryRun: ctx.flags.dryRun,
    debug: ctx.flags.debug,
    onEvent: selection.onEvent,
  });
}
