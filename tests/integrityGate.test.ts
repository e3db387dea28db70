import { describe, it, expect, afterEach } from "vitest";
import { integrityGate } from "../src/gates/integrity.js";
import { createSchema, hasSchema, openDatabase, tableCounts, type Db } from "../src/writers/database.js";

describe("integrityGate", () => {
  let db: Db | null = null;

  afterEach(() => {
    db?.close();
    db = null;
  });

  it("passes on an empty schema", async () => {
    const conn = await openDatabase(":memory:");
    db = conn;
    expect(hasSchema(conn)).toBe(false);
    createSchema(conn);
    expect(hasSchema(conn)).toBe(true);
    expect(tableCounts(conn)).toEqual({ jurisdictions: 0, sectors: 0, laws: 0, barriers: 0 });
    expect(() => integrityGate(conn)).not.toThrow();
  });

  it("reports dangling references", async () => {
    const conn = await openDatabase(":memory:");
    db = conn;
    createSchema(conn);
    conn.exec("PRAGMA foreign_keys = OFF");
    conn.exec(`
      INSERT INTO laws (jurisdiction_id, name, type, summary, enforceability)
      VALUES (99, 'Ghost Law', 'Mixed', 'x', 'Unrated');
      INSERT INTO barriers (law_id, sector_id, risk_score, description)
      VALUES (42, 7, 5, 'y');
    `);
    expect(() => integrityGate(conn)).toThrowError(
      [
        "IntegrityGate failed:",
        "Law 1 references missing jurisdiction 99",
        "Barrier 1 references missing law 42",
        "Barrier 1 references missing sector 7",
      ].join("\n"),
    );
  });

  it("reports duplicate names in a table created without a unique constraint", async () => {
    const conn = await openDatabase(":memory:");
    db = conn;
    conn.exec(
      "CREATE TABLE jurisdictions (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT)",
    );
    createSchema(conn);
    conn.exec("INSERT INTO jurisdictions (name) VALUES ('Canada'), ('Canada')");
    expect(() => integrityGate(conn)).toThrowError(
      "IntegrityGate failed:\nDuplicate jurisdictions name: Canada (x2)",
    );
  });

  it("rejects dangling references at insert time when foreign keys are on", async () => {
    const conn = await openDatabase(":memory:");
    db = conn;
    createSchema(conn);
    expect(() =>
      conn.exec(
        "INSERT INTO laws (jurisdiction_id, name) VALUES (123, 'Nowhere Act')",
      ),
    ).toThrow(/FOREIGN KEY constraint failed/);
  });
});
