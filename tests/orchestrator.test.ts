import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { loadContext } from "../src/core/context.js";
import {
  checkDatabase,
  loadDashboard,
  runExport,
  runImport,
  setupDatabase,
} from "../src/core/orchestrator.js";
import { workbookBuffer } from "./fixtures.js";

describe("orchestrator", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "innodash-run-"));
    await fs.writeFile(path.join(tmp, "laws_import.xlsx"), workbookBuffer());
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tmp);
  });

  it("sets up, imports, and checks a database file", async () => {
    const ctx = loadContext({ dir: tmp, db: "db/legal.db" }, {});
    expect(await setupDatabase(ctx)).toEqual({
      jurisdictions: 0,
      sectors: 0,
      laws: 0,
      barriers: 0,
    });

    const { plan, report } = await runImport(ctx);
    expect(plan.laws).toHaveLength(5);
    expect(report?.totals).toEqual({
      jurisdictions: 4,
      sectors: 5,
      laws: 5,
      barriers: 7,
    });
    expect(await checkDatabase(ctx)).toEqual(report?.totals);
  });

  it("starts from an empty database with --clean", async () => {
    const ctx = loadContext({ dir: tmp }, {});
    await runImport(ctx);
    const { report } = await runImport(ctx, { clean: true });
    expect(report?.totals.laws).toBe(5);
  });

  it("writes nothing on a dry run", async () => {
    const ctx = loadContext({ dir: tmp, dryRun: true }, {});
    const { plan, report } = await runImport(ctx);
    expect(report).toBeNull();
    expect(plan.dropped).toEqual([{ rowNumber: 5, missing: ["law"] }]);
    expect(await fs.pathExists(ctx.dbPath)).toBe(false);
  });

  it("refuses to check a database without the schema", async () => {
    const ctx = loadContext({ dir: tmp, db: "empty.db" }, {});
    await expect(checkDatabase(ctx)).rejects.toThrowError(/has no legislation schema/);
    expect(await fs.pathExists(ctx.dbPath)).toBe(false);
  });

  it("shows scores without legislation when the workbook is missing", async () => {
    const ctx = loadContext({ dir: tmp, workbook: "absent.xlsx" }, {});
    const view = await loadDashboard(ctx, { industry: "Fintech" });
    expect(view.scores).toHaveLength(4);
    expect(view.legislation).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("exports the filtered view", async () => {
    const ctx = loadContext({ dir: tmp, outDir: "out" }, {});
    const result = await runExport(ctx, {
      industry: "Luxury",
      jurisdictions: ["Canada"],
      formats: "csv,html",
    });
    expect(result.written.map((f) => path.basename(f))).toEqual([
      "luxury_innovation_scores.csv",
      "luxury_legislation.csv",
      "luxury_innovation_report.html",
    ]);
    const csv = await fs.readFile(path.join(tmp, "out", "luxury_legislation.csv"), "utf8");
    expect(csv.split("\r\n")).toEqual([
      "Jurisdiction,Law/Subprovision,Significance,Innovation Stage,Enforceability,Risk Score",
      "Canada,,Row without a law name,Mature,Low,2",
      "Canada,Trademarks Act s.19,Exclusive right to registered marks,Mature,Medium,5",
    ]);
  });
});
