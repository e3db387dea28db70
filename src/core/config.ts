import dotenv from "dotenv";
import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

const optionalPath = z
  .string()
  .trim()
  .transform((v) => (v ? v : undefined))
  .optional();

const envSchema = z.object({
  INNODASH_WORKBOOK: z.string().trim().min(1).default("laws_import.xlsx"),
  INNODASH_DB: z.string().trim().min(1).default("legal_data.db"),
  INNODASH_OUT: z.string().trim().min(1).default("exports"),
  INNODASH_SHEET: optionalPath,
  INNODASH_WKHTMLTOPDF: optionalPath,
});

export type AppConfig = {
  workbook: string;
  database: string;
  outDir: string;
  sheet?: string;
  wkhtmltopdf?: string;
};

/** Parses a `.env` file without touching process.env; missing file → {}. */
export function readEnvFile(root: string): Record<string, string> {
  const envPath = path.join(root, ".env");
  if (!fs.existsSync(envPath)) return {};
  return dotenv.parse(fs.readFileSync(envPath, "utf8"));
}

export function loadConfig(
  env: Record<string, string | undefined>,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  const v = parsed.data;
  return {
    workbook: v.INNODASH_WORKBOOK,
    database: v.INNODASH_DB,
    outDir: v.INNODASH_OUT,
    sheet: v.INNODASH_SHEET,
    wkhtmltopdf: v.INNODASH_WKHTMLTOPDF,
  };
}
