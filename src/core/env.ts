import fg from "fast-glob";
import fs from "fs-extra";
import path from "node:path";
import { resolveWkhtmltopdf } from "../writers/pdf.js";
import type { DashboardContext } from "./context.js";

type CheckResult = { name: string; pass: boolean; info?: string };

function pad(name: string, width: number) {
  return (name + " ".repeat(width)).slice(0, width);
}

function ok(pass: boolean) {
  return pass ? "✓" : "✗";
}

/** Other spreadsheets next to the configured one, for a helpful hint. */
export async function findWorkbooks(root: string): Promise<string[]> {
  return fg(["*.xlsx", "data/*.xlsx"], {
    cwd: root,
    ignore: ["node_modules/**", "**/~$*"],
  });
}

export async function checkEnvironment(
  ctx: DashboardContext,
  log: Console = console,
) {
  const results: CheckResult[] = [];
  const add = (name: string, pass: boolean, info?: string) =>
    results.push({ name, pass, info });

  const [maj = 0] = process.versions.node.split(".").map(Number);
  add("Node >= 20", maj >= 20, process.versions.node);

  const workbookOk = await fs.pathExists(ctx.workbook);
  let workbookInfo = path.relative(ctx.root, ctx.workbook);
  if (!workbookOk) {
    const found = await findWorkbooks(ctx.root);
    if (found.length) workbookInfo += ` (found: ${found.join(", ")})`;
  }
  add("legislation workbook", workbookOk, workbookInfo);

  const dbOk = ctx.dbPath === ":memory:" || (await fs.pathExists(ctx.dbPath));
  add("database file (optional)", dbOk, path.relative(ctx.root, ctx.dbPath));

  const pdfBinary = await resolveWkhtmltopdf(ctx.wkhtmltopdf);
  add(
    "wkhtmltopdf (optional)",
    pdfBinary !== null,
    pdfBinary ?? "PDF export disabled",
  );

  const width = 32;
  log.info("Environment check:");
  for (const r of results) {
    log.info(`  ${ok(r.pass)} ${pad(`${r.name}:`, width)}${r.info ?? ""}`);
  }
  const allPass = results.every((r) => r.pass || r.name.includes("(optional)"));
  if (!allPass) {
    log.warn("Some requirements not met. Import and legislation views will fail until they are.");
  }
  return allPass;
}
