import { z } from "zod";
import { tableCounts, type Db } from "../writers/database.js";
import { emitEngineEvent, type EngineEventListener } from "./events.js";
import {
  BARRIER_RISK_SCORE,
  DEFAULT_ENFORCEABILITY,
  LAW_TYPE,
  barrierDescription,
  buildImportPlan,
  type DroppedRow,
  type ImportPlan,
} from "./importPlan.js";
import { logDebug, logWarn } from "./logger.js";
import type { LegislationRow, TableCounts } from "./types.js";

export type SkippedLaw = {
  rowNumber: number;
  law: string;
  jurisdiction: string;
};

export type SkippedLink = {
  rowNumber: number;
  law: string;
  sector: string;
};

export type ImportReport = {
  inserted: TableCounts;
  totals: TableCounts;
  dropped: DroppedRow[];
  skippedLaws: SkippedLaw[];
  skippedLinks: SkippedLink[];
};

export type ImportOptions = {
  debug?: boolean;
  onEvent?: EngineEventListener;
};

const idRow = z.object({ id: z.number() });

export function applyImportPlan(
  db: Db,
  plan: ImportPlan,
  opts: ImportOptions = {},
): ImportReport {
  const { debug = false, onEvent } = opts;
  const inserted: TableCounts = {
    jurisdictions: 0,
    sectors: 0,
    laws: 0,
    barriers: 0,
  };
  const skippedLaws: SkippedLaw[] = [];
  const skippedLinks: SkippedLink[] = [];

  // Phase 1: reference tables.
  emitEngineEvent({ type: "stage-start", stage: "reference-tables" }, onEvent);
  const writeReferences = () => {
    for (const name of plan.jurisdictions) {
      inserted.jurisdictions += db.run(
        "INSERT OR IGNORE INTO jurisdictions (name) VALUES (?)",
        [name],
      ).changes;
    }
    for (const name of plan.sectors) {
      inserted.sectors += db.run(
        "INSERT OR IGNORE INTO sectors (name) VALUES (?)",
        [name],
      ).changes;
    }
  };
  try {
    db.transaction(writeReferences);
  } catch (err) {
    emitEngineEvent(
      { type: "stage-end", stage: "reference-tables", success: false },
      onEvent,
    );
    throw err;
  }
  logDebug(debug, "reference tables written", {
    jurisdictions: inserted.jurisdictions,
    sectors: inserted.sectors,
  });
  emitEngineEvent(
    {
      type: "stage-end",
      stage: "reference-tables",
      success: true,
      data: {
        jurisdictions: inserted.jurisdictions,
        sectors: inserted.sectors,
      },
    },
    onEvent,
  );

  // Phase 2: laws and barriers, resolved by name against phase 1.
  emitEngineEvent({ type: "stage-start", stage: "dependent-rows" }, onEvent);
  const findId = (table: "jurisdictions" | "sectors", name: string) =>
    db.get(`SELECT id FROM ${table} WHERE name = ?`, [name], idRow)?.id;
  const writeDependents = () => {
    for (const law of plan.laws) {
      const jurisdictionId = findId("jurisdictions", law.jurisdiction);
      if (jurisdictionId === undefined) {
        skippedLaws.push({
          rowNumber: law.rowNumber,
          law: law.name,
          jurisdiction: law.jurisdiction,
        });
        continue;
      }

      const lawId = db.run(
        `INSERT INTO laws (jurisdiction_id, name, type, summary, enforceability)
         VALUES (?, ?, ?, ?, ?)`,
        [jurisdictionId, law.name, LAW_TYPE, law.summary, DEFAULT_ENFORCEABILITY],
      ).lastInsertRowid;
      inserted.laws += 1;

      for (const sector of law.sectors) {
        const sectorId = findId("sectors", sector);
        if (sectorId === undefined) {
          skippedLinks.push({ rowNumber: law.rowNumber, law: law.name, sector });
          continue;
        }
        db.run(
          `INSERT INTO barriers (law_id, sector_id, risk_score, description)
           VALUES (?, ?, ?, ?)`,
          [lawId, sectorId, BARRIER_RISK_SCORE, barrierDescription(law.stage, sector)],
        );
        inserted.barriers += 1;
      }
    }
  };
  try {
    db.transaction(writeDependents);
  } catch (err) {
    emitEngineEvent(
      { type: "stage-end", stage: "dependent-rows", success: false },
      onEvent,
    );
    throw err;
  }

  for (const s of skippedLaws) {
    logWarn(
      `row ${s.rowNumber}: jurisdiction "${s.jurisdiction}" not found; law "${s.law}" skipped`,
    );
    emitEngineEvent({ type: "warning", data: { ...s, kind: "law" } }, onEvent);
  }
  for (const s of skippedLinks) {
    logWarn(
      `row ${s.rowNumber}: sector "${s.sector}" not found; barrier for "${s.law}" skipped`,
    );
    emitEngineEvent({ type: "warning", data: { ...s, kind: "barrier" } }, onEvent);
  }
  emitEngineEvent(
    {
      type: "stage-end",
      stage: "dependent-rows",
      success: true,
      data: { laws: inserted.laws, barriers: inserted.barriers },
    },
    onEvent,
  );

  return {
    inserted,
    totals: tableCounts(db),
    dropped: plan.dropped,
    skippedLaws,
    skippedLinks,
  };
}

export function importLegislation(
  db: Db,
  rows: LegislationRow[],
  opts: ImportOptions = {},
): ImportReport {
  const plan = buildImportPlan(rows);
  logDebug(opts.debug ?? false, "import plan", {
    jurisdictions: plan.jurisdictions.length,
    sectors: plan.sectors.length,
    laws: plan.laws.length,
    dropped: plan.dropped.length,
  });
  for (const d of plan.dropped) {
    emitEngineEvent(
      {
        type: "step-end",
        stage: "normalize",
        data: {
          name: `row ${d.rowNumber}`,
          status: "skip",
          error: `missing ${d.missing.join(", ")}`,
        },
      },
      opts.onEvent,
    );
  }
  return applyImportPlan(db, plan, opts);
}
