import ora, { type Ora } from "ora";
import { loadContext, type CliOptions, type DashboardContext } from "../core/context.js";
import { checkEnvironment } from "../core/env.js";
import { setEngineEventListener } from "../core/events.js";
import { logInfo } from "../core/logger.js";
import {
  checkDatabase,
  loadDashboard,
  runExport as exportSelection,
  runImport as importWorkbook,
  setupDatabase,
} from "../core/orchestrator.js";
import { parseJurisdictionList } from "../core/dashboard.js";
import { ProgressReporter, progressModeFromOpts } from "./progress.js";
import { renderDashboard, renderImportReport } from "./render.js";

export type RunOptions = CliOptions & {
  clean?: boolean;
  industry?: string;
  jurisdictions?: string;
  formats?: string;
};

function printAbove(spinner: Ora | null, line: string) {
  if (!spinner) {
    console.log(line);
    return;
  }
  spinner.clear();
  console.log(line);
  spinner.render();
}

async function withContext<T>(
  label: string,
  opts: RunOptions,
  stage: (ctx: DashboardContext) => Promise<T>,
): Promise<T> {
  const useSpinner = !opts.quiet;
  const spinner = useSpinner ? ora(label).start() : null;
  const reporter = new ProgressReporter(progressModeFromOpts(opts), (line) =>
    printAbove(spinner, line),
  );
  setEngineEventListener((ev) => reporter.log(ev));
  try {
    const ctx = loadContext(opts);
    const result = await stage(ctx);
    if (spinner) spinner.succeed("done");
    return result;
  } catch (e) {
    if (spinner) spinner.fail(String(e));
    throw e;
  } finally {
    setEngineEventListener(null);
  }
}

export async function runSetupDb(opts: RunOptions) {
  return withContext("innodash setup-db", opts, async (ctx) => {
    const counts = await setupDatabase(ctx);
    logInfo(`schema ready at ${ctx.dbPath}`, counts);
    return counts;
  });
}

export async function runImport(opts: RunOptions) {
  return withContext("innodash import", opts, async (ctx) => {
    const { plan, report } = await importWorkbook(ctx, { clean: opts.clean });
    if (!report) {
      logInfo("[dry-run] import plan", {
        jurisdictions: plan.jurisdictions,
        sectors: plan.sectors,
        laws: plan.laws.length,
        dropped: plan.dropped.map((d) => d.rowNumber),
      });
      return null;
    }
    for (const line of renderImportReport(report)) console.log(line);
    return report;
  });
}

export async function runDashboard(opts: RunOptions) {
  // Printed after the spinner settles so the tables are not interleaved.
  const view = await withContext("innodash dashboard", opts, (ctx) =>
    loadDashboard(ctx, {
      industry: opts.industry,
      jurisdictions: parseJurisdictionList(opts.jurisdictions),
    }),
  );
  for (const line of renderDashboard(view)) console.log(line);
  return view;
}

export async function runExport(opts: RunOptions) {
  return withContext("innodash export", opts, async (ctx) => {
    const result = await exportSelection(ctx, {
      industry: opts.industry,
      jurisdictions: parseJurisdictionList(opts.jurisdictions),
      formats: opts.formats,
    });
    if (ctx.flags.dryRun) return result;
    logInfo(`wrote ${result.written.length} file(s) to ${ctx.outDir}`);
    return result;
  });
}

export async function runCheck(opts: RunOptions) {
  return withContext("innodash check", opts, async (ctx) => {
    const counts = await checkDatabase(ctx);
    logInfo("integrity ok", counts);
    return counts;
  });
}

export async function runDoctor(opts: RunOptions) {
  const spinner = ora("innodash doctor").start();
  try {
    const ctx = loadContext(opts);
    spinner.stop();
    const pass = await checkEnvironment(ctx, console);
    if (pass) spinner.succeed("checked");
    else spinner.warn("checked with missing requirements");
    return pass;
  } catch (e) {
    spinner.fail(String(e));
    throw e;
  }
}
