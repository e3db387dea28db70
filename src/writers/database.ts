import fs from "fs-extra";
import path from "node:path";
import initSqlJs, {
  type BindParams,
  type Database,
  type SqlJsStatic,
} from "sql.js";
import { z } from "zod";
import type { TableCounts } from "../core/types.js";

export const MEMORY = ":memory:";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS jurisdictions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS sectors (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS laws (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  jurisdiction_id INTEGER NOT NULL,
  name TEXT NOT NULL,
  type TEXT,
  summary TEXT,
  enforceability TEXT,
  FOREIGN KEY(jurisdiction_id) REFERENCES jurisdictions(id)
);

CREATE TABLE IF NOT EXISTS barriers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  law_id INTEGER NOT NULL,
  sector_id INTEGER NOT NULL,
  risk_score INTEGER,
  description TEXT,
  FOREIGN KEY(law_id) REFERENCES laws(id),
  FOREIGN KEY(sector_id) REFERENCES sectors(id)
);
`;

export const TABLES = ["jurisdictions", "sectors", "laws", "barriers"] as const;

export type RunResult = { changes: number; lastInsertRowid: number };

const countRow = z.object({ n: z.number() });
const rowidRow = z.object({ id: z.number() });
const nameRow = z.object({ name: z.string() });

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine() {
  if (!engine) engine = initSqlJs();
  return engine;
}

/**
 * An in-memory SQLite connection backed by a file. Rows come back through a
 * zod schema; `save` writes the whole image to disk.
 */
export class Db {
  constructor(
    private readonly raw: Database,
    readonly file: string,
  ) {}

  exec(sql: string) {
    this.raw.exec(sql);
  }

  all<T>(sql: string, params: BindParams, row: z.ZodType<T>): T[] {
    const stmt = this.raw.prepare(sql);
    try {
      stmt.bind(params);
      const out: T[] = [];
      while (stmt.step()) out.push(row.parse(stmt.getAsObject()));
      return out;
    } finally {
      stmt.free();
    }
  }

  get<T>(sql: string, params: BindParams, row: z.ZodType<T>): T | undefined {
    return this.all(sql, params, row)[0];
  }

  run(sql: string, params: BindParams = []): RunResult {
    this.raw.run(sql, params);
    const changes = this.raw.getRowsModified();
    const last = this.get("SELECT last_insert_rowid() AS id", [], rowidRow);
    return { changes, lastInsertRowid: last?.id ?? 0 };
  }

  /** Runs `fn` inside BEGIN/COMMIT; any throw rolls the whole block back. */
  transaction(fn: () => void) {
    this.raw.exec("BEGIN");
    try {
      fn();
      this.raw.exec("COMMIT");
    } catch (err) {
      this.raw.exec("ROLLBACK");
      throw err;
    }
  }

  save() {
    if (this.file === MEMORY) return;
    fs.outputFileSync(this.file, Buffer.from(this.raw.export()));
    // export() reopens the connection, which resets pragmas.
    this.raw.exec("PRAGMA foreign_keys = ON");
  }

  close() {
    this.raw.close();
  }
}

export async function openDatabase(file: string): Promise<Db> {
  const SQL = await loadEngine();
  const resolved = file === MEMORY ? MEMORY : path.resolve(file);
  const image =
    resolved !== MEMORY && (await fs.pathExists(resolved))
      ? await fs.readFile(resolved)
      : null;
  const db = new Db(new SQL.Database(image), resolved);
  db.exec("PRAGMA foreign_keys = ON");
  return db;
}

export function createSchema(db: Db) {
  db.exec(SCHEMA_SQL);
}

export function tableCounts(db: Db): TableCounts {
  const count = (table: (typeof TABLES)[number]) =>
    db.get(`SELECT COUNT(*) AS n FROM ${table}`, [], countRow)?.n ?? 0;
  return {
    jurisdictions: count("jurisdictions"),
    sectors: count("sectors"),
    laws: count("laws"),
    barriers: count("barriers"),
  };
}

export function hasSchema(db: Db): boolean {
  const rows = db.all(
    "SELECT name FROM sqlite_master WHERE type = 'table'",
    [],
    nameRow,
  );
  const names = new Set(rows.map((r) => r.name));
  return TABLES.every((t) => names.has(t));
}
