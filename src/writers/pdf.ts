import { execa } from "execa";
import fs from "fs-extra";

export const WKHTMLTOPDF = "wkhtmltopdf";

/** Runs the renderer binary; the HTML page is passed on stdin. */
export type PdfRunner = (
  binary: string,
  args: string[],
  input: string,
) => Promise<void>;

export type PdfResult =
  | { status: "written"; file: string }
  | { status: "skipped"; reason: string };

const runWithExeca: PdfRunner = async (binary, args, input) => {
  await execa(binary, args, { input });
};

export async function findOnPath(cmd: string): Promise<string | null> {
  try {
    const { stdout } = await execa(
      process.platform === "win32" ? "where" : "which",
      [cmd],
    );
    const first = stdout.split(/\r?\n/)[0]?.trim();
    return first ? first : null;
  } catch {
    return null;
  }
}

/**
 * Resolves the wkhtmltopdf binary: an explicitly configured path wins,
 * otherwise the first match on PATH.
 */
export async function resolveWkhtmltopdf(
  configured?: string,
): Promise<string | null> {
  if (configured) {
    return (await fs.pathExists(configured)) ? configured : null;
  }
  return findOnPath(WKHTMLTOPDF);
}

export async function renderPdf(
  html: string,
  dest: string,
  opts: { binary: string | null; run?: PdfRunner },
): Promise<PdfResult> {
  if (!opts.binary) {
    return {
      status: "skipped",
      reason:
        "PDF export needs wkhtmltopdf. Install it or set INNODASH_WKHTMLTOPDF to its path.",
    };
  }
  const run = opts.run ?? runWithExeca;
  await run(opts.binary, ["--quiet", "--encoding", "utf-8", "-", dest], html);
  return { status: "written", file: dest };
}
