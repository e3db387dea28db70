#!/usr/bin/env node
import { Command } from "commander";
import { logError } from "../core/logger.js";
import { INDUSTRIES } from "../core/types.js";
import {
  runCheck,
  runDashboard,
  runDoctor,
  runExport,
  runImport,
  runSetupDb,
  type RunOptions,
} from "./runners.js";

const program = new Command()
  .name("innodash")
  .description(
    "Innovation score dashboard and legislation workbook importer",
  )
  .option("--dir <dir>", "project directory (default: cwd)")
  .option("--db <file>", "SQLite database file (env: INNODASH_DB)")
  .option("--workbook <file>", "legislation workbook (env: INNODASH_WORKBOOK)")
  .option("--sheet <name>", "worksheet to read (default: first sheet)")
  .option("--dry-run", "Plan actions without writing anything")
  .option("--debug", "Verbose logging of steps and queries")
  .option("--verbose", "More verbose logging")
  .option("--quiet", "Minimal output (no spinners, only errors)");

const industryHelp = `industry (${INDUSTRIES.join(" | ")})`;

function globals(): RunOptions {
  return program.opts<RunOptions>();
}

program
  .command("setup-db")
  .description("Create the jurisdictions/sectors/laws/barriers schema")
  .action(async () => {
    await runSetupDb(globals());
  });

program
  .command("import")
  .description("Import the legislation workbook into the database")
  .option("--clean", "remove the existing database file before importing")
  .action(async (cmdOpts: { clean?: boolean }) => {
    await runImport({ ...globals(), ...cmdOpts });
  });

program
  .command("dashboard")
  .description("Show scores, chart and legislation for a selection")
  .option("--industry <name>", industryHelp, "All Industries")
  .option("--jurisdictions <csv>", "comma-separated jurisdictions (default: all)")
  .action(async (cmdOpts: { industry?: string; jurisdictions?: string }) => {
    await runDashboard({ ...globals(), ...cmdOpts });
  });

program
  .command("export")
  .description("Export the selected view as CSV/HTML/PDF (default: csv,pdf)")
  .option("--industry <name>", industryHelp, "All Industries")
  .option("--jurisdictions <csv>", "comma-separated jurisdictions (default: all)")
  .option("--formats <csv>", "comma-separated formats (csv,html,pdf)", "csv,pdf")
  .option("--out-dir <dir>", "output directory (env: INNODASH_OUT)")
  .action(
    async (cmdOpts: {
      industry?: string;
      jurisdictions?: string;
      formats?: string;
      outDir?: string;
    }) => {
      await runExport({ ...globals(), ...cmdOpts });
    },
  );

program
  .command("check")
  .description("Check referential integrity of the imported database")
  .action(async () => {
    await runCheck(globals());
  });

program
  .command("doctor")
  .description("Check environment, inputs and the PDF renderer")
  .action(async () => {
    await runDoctor(globals());
  });

program.parseAsync().catch((e: unknown) => {
  logError(e instanceof Error ? e.message : e);
  process.exit(1);
});
