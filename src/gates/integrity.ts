import { z } from "zod";
import type { Db } from "../writers/database.js";

const duplicateRow = z.object({ name: z.string(), n: z.number() });
const orphanRow = z.object({ id: z.number(), ref: z.number() });

export function integrityGate(db: Db) {
  const errors: string[] = [];

  for (const table of ["jurisdictions", "sectors"] as const) {
    const dupes = db.all(
      `SELECT name, COUNT(*) AS n FROM ${table} GROUP BY name HAVING COUNT(*) > 1`,
      [],
      duplicateRow,
    );
    for (const d of dupes) {
      errors.push(`Duplicate ${table} name: ${d.name} (x${d.n})`);
    }
  }

  const orphanLaws = db.all(
    `SELECT l.id AS id, l.jurisdiction_id AS ref FROM laws l
     LEFT JOIN jurisdictions j ON j.id = l.jurisdiction_id
     WHERE j.id IS NULL`,
    [],
    orphanRow,
  );
  for (const o of orphanLaws) {
    errors.push(`Law ${o.id} references missing jurisdiction ${o.ref}`);
  }

  const orphanByLaw = db.all(
    `SELECT b.id AS id, b.law_id AS ref FROM barriers b
     LEFT JOIN laws l ON l.id = b.law_id
     WHERE l.id IS NULL`,
    [],
    orphanRow,
  );
  for (const o of orphanByLaw) {
    errors.push(`Barrier ${o.id} references missing law ${o.ref}`);
  }

  const orphanBySector = db.all(
    `SELECT b.id AS id, b.sector_id AS ref FROM barriers b
     LEFT JOIN sectors s ON s.id = b.sector_id
     WHERE s.id IS NULL`,
    [],
    orphanRow,
  );
  for (const o of orphanBySector) {
    errors.push(`Barrier ${o.id} references missing sector ${o.ref}`);
  }

  if (errors.length) {
    throw new Error(`IntegrityGate failed:\n${errors.join("\n")}`);
  }
}
