import fs from "fs-extra";
import * as XLSX from "xlsx";
import {
  REQUIRED_FIELDS,
  WORKBOOK_COLUMNS,
  type LegislationRow,
  type WorkbookField,
} from "../core/types.js";

export type WorkbookOptions = {
  sheet?: string;
};

export type WorkbookData = {
  sheetName: string;
  rows: LegislationRow[];
};

const fields = Object.keys(WORKBOOK_COLUMNS).filter(
  (k): k is WorkbookField => k in WORKBOOK_COLUMNS,
);

export function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  const text = String(value).trim();
  return text ? text : null;
}

/**
 * Turns a sheet matrix (first row = headers) into typed rows.
 * `origin` is the zero-based sheet row of the header line.
 */
export function rowsFromSheet(
  matrix: unknown[][],
  origin = 0,
): LegislationRow[] {
  const [headerRow, ...body] = matrix;
  if (!headerRow) {
    throw new Error("Workbook sheet is empty (no header row)");
  }

  const headers = new Map<string, number>();
  headerRow.forEach((cell, idx) => {
    const name = cellText(cell);
    if (name && !headers.has(name)) headers.set(name, idx);
  });

  const missing = REQUIRED_FIELDS.map((f) => WORKBOOK_COLUMNS[f]).filter(
    (col) => !headers.has(col),
  );
  if (missing.length) {
    throw new Error(
      `Workbook is missing required columns: ${missing.join(", ")}`,
    );
  }

  const rows: LegislationRow[] = [];
  body.forEach((cells, idx) => {
    if (cells.every((c) => cellText(c) === null)) return;
    const row: LegislationRow = {
      rowNumber: origin + idx + 2,
      jurisdiction: null,
      law: null,
      significance: null,
      relevantIndustry: null,
      innovationStage: null,
      enforceability: null,
      riskScore: null,
    };
    for (const field of fields) {
      const col = headers.get(WORKBOOK_COLUMNS[field]);
      row[field] = col === undefined ? null : cellText(cells[col]);
    }
    rows.push(row);
  });
  return rows;
}

export function parseWorkbook(
  data: Buffer,
  opts: WorkbookOptions = {},
): WorkbookData {
  const workbook = XLSX.read(data, { type: "buffer" });
  const sheetName = opts.sheet ?? workbook.SheetNames[0];
  if (!sheetName) {
    throw new Error("Workbook contains no sheets");
  }
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new Error(
      `Sheet not found: ${sheetName} (available: ${workbook.SheetNames.join(", ")})`,
    );
  }

  const origin = sheet["!ref"] ? XLSX.utils.decode_range(sheet["!ref"]).s.r : 0;
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
  });
  return { sheetName, rows: rowsFromSheet(matrix, origin) };
}

export async function readWorkbook(
  file: string,
  opts: WorkbookOptions = {},
): Promise<WorkbookData> {
  if (!(await fs.pathExists(file))) {
    throw new Error(`Workbook not found: ${file}`);
  }
  const data = await fs.readFile(file);
  return parseWorkbook(data, opts);
}
