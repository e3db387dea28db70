import path from "node:path";
import { loadConfig, readEnvFile } from "./config.js";

export type CliOptions = {
  dir?: string;
  db?: string;
  workbook?: string;
  sheet?: string;
  outDir?: string;
  dryRun?: boolean;
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export type DashboardContext = {
  root: string;
  workbook: string;
  dbPath: string;
  outDir: string;
  sheet?: string;
  wkhtmltopdf?: string;
  flags: {
    dryRun: boolean;
    debug: boolean;
    verbose: boolean;
    quiet: boolean;
  };
};

export function loadContext(
  opts: CliOptions,
  env: Record<string, string | undefined> = process.env,
): DashboardContext {
  const root = path.resolve(process.cwd(), opts.dir ?? ".");
  // Real environment variables take precedence over .env entries.
  const config = loadConfig({ ...readEnvFile(root), ...env });
  const resolve = (p: string) => (p === ":memory:" ? p : path.resolve(root, p));

  return {
    root,
    workbook: resolve(opts.workbook ?? config.workbook),
    dbPath: resolve(opts.db ?? config.database),
    outDir: resolve(opts.outDir ?? config.outDir),
    sheet: opts.sheet ?? config.sheet,
    wkhtmltopdf: config.wkhtmltopdf
      ? path.resolve(root, config.wkhtmltopdf)
      : undefined,
    flags: {
      dryRun: !!opts.dryRun,
      debug: !!opts.debug,
      verbose: !!opts.verbose,
      quiet: !!opts.quiet,
    },
  };
}
